import "reflect-metadata"

import {beforeEach, describe, expect, it, vi} from "vitest";
import {container} from "tsyringe";
import {ClockToken} from "../../../src/config/types";
import {AccountNotFoundException} from "../../../src/banking/application/domain/exception/AccountNotFoundException";
import {AccountNotOwnedException} from "../../../src/banking/application/domain/exception/AccountNotOwnedException";
import {CustomerNotFoundException} from "../../../src/banking/application/domain/exception/CustomerNotFoundException";
import {AccountNumber} from "../../../src/banking/application/domain/model/AccountNumber";
import {Money} from "../../../src/banking/application/domain/model/Money";
import {Deposit, Withdrawal} from "../../../src/banking/application/domain/model/Transaction";
import {
    AccountProperties,
    AccountPropertiesToken
} from "../../../src/banking/application/domain/service/AccountProperties";
import {OpenAccountCommand} from "../../../src/banking/application/port/in/OpenAccountCommand";
import type {LoadAccountPort} from "../../../src/banking/application/port/out/LoadAccountPort";
import {LoadAccountPortToken} from "../../../src/banking/application/port/out/LoadAccountPort";
import type {LoadCustomerPort} from "../../../src/banking/application/port/out/LoadCustomerPort";
import {LoadCustomerPortToken} from "../../../src/banking/application/port/out/LoadCustomerPort";
import type {SaveAccountPort} from "../../../src/banking/application/port/out/SaveAccountPort";
import {SaveAccountPortToken} from "../../../src/banking/application/port/out/SaveAccountPort";
import {AccountApplicationService} from "../../../src/banking/application/service/AccountApplicationService";
import {checkingAccount, individual, TestClock} from "../../helpers/fixtures";

/**
 * AccountApplicationService のテスト
 *
 * 台帳はモック、口座と顧客は実物を使う
 */
describe("AccountApplicationService", () => {
    let mockLoadCustomerPort: LoadCustomerPort;
    let mockLoadAccountPort: LoadAccountPort;
    let mockSaveAccountPort: SaveAccountPort;
    let clock: TestClock;
    let service: AccountApplicationService;

    beforeEach(() => {
        container.clearInstances();
        vi.spyOn(console, "log").mockImplementation(() => undefined);

        clock = new TestClock();
        mockLoadCustomerPort = {
            findCustomerByNationalId: vi.fn().mockResolvedValue(null),
            findAllCustomers: vi.fn().mockResolvedValue([]),
        };
        mockLoadAccountPort = {
            findAccountByNumber: vi.fn().mockResolvedValue(null),
            findAllAccounts: vi.fn().mockResolvedValue([]),
        };
        mockSaveAccountPort = {
            nextAccountNumber: vi.fn().mockResolvedValue(new AccountNumber(5)),
            saveAccount: vi.fn().mockResolvedValue(undefined),
        };

        container.register(LoadCustomerPortToken, {useValue: mockLoadCustomerPort});
        container.register(LoadAccountPortToken, {useValue: mockLoadAccountPort});
        container.register(SaveAccountPortToken, {useValue: mockSaveAccountPort});
        container.register(AccountPropertiesToken, {
            useValue: new AccountProperties("0042", Money.of(20000), 2),
        });
        container.register(ClockToken, {useValue: clock.now});

        service = container.resolve(AccountApplicationService);
    });

    describe("openAccount", () => {
        it("設定どおりの当座預金口座を開設し、顧客と台帳に登録する", async () => {
            // Arrange
            const customer = individual();
            vi.mocked(mockLoadCustomerPort.findCustomerByNationalId).mockResolvedValue(customer);

            // Act
            const account = await service.openAccount(new OpenAccountCommand(customer.getNationalId()));

            // Assert
            expect(account.getNumber().getValue()).toBe(5);
            expect(account.getBranchCode()).toBe("0042");
            expect(account.getKind()).toBe("checking");
            expect(account.getPolicy().perWithdrawalLimit?.getAmount()).toBe(20000n);
            expect(account.getPolicy().maxWithdrawalsPerPeriod).toBe(2);
            expect(account.getCustomer()).toBe(customer);
            expect(customer.getAccounts()).toEqual([account]);
            expect(mockSaveAccountPort.saveAccount).toHaveBeenCalledWith(account);
        });

        it("開設した口座は注入された時計で履歴を記録する", async () => {
            // Arrange
            const customer = individual();
            vi.mocked(mockLoadCustomerPort.findCustomerByNationalId).mockResolvedValue(customer);
            const account = await service.openAccount(new OpenAccountCommand(customer.getNationalId()));

            // Act
            clock.set(new Date(2026, 0, 2, 8, 30, 0));
            new Deposit(Money.of(100)).apply(account);

            // Assert
            const [entry] = [...account.getHistory().entries()];
            expect(entry.timestamp).toEqual(new Date(2026, 0, 2, 8, 30, 0));
        });

        it("設定した出金回数の上限が適用される", async () => {
            // Arrange
            const customer = individual();
            vi.mocked(mockLoadCustomerPort.findCustomerByNationalId).mockResolvedValue(customer);
            const account = await service.openAccount(new OpenAccountCommand(customer.getNationalId()));
            new Deposit(Money.of(1000)).apply(account);

            // Act
            const results = [1, 2, 3].map(() => new Withdrawal(Money.of(100)).apply(account).success);

            // Assert
            expect(results).toEqual([true, true, false]);
        });

        it("台帳への保存に失敗した口座は顧客に紐付かない", async () => {
            // Arrange
            const customer = individual();
            vi.mocked(mockLoadCustomerPort.findCustomerByNationalId).mockResolvedValue(customer);
            vi.mocked(mockSaveAccountPort.saveAccount).mockRejectedValue(new Error("ledger unavailable"));

            // Act & Assert
            await expect(
                service.openAccount(new OpenAccountCommand(customer.getNationalId()))
            ).rejects.toThrow("ledger unavailable");
            expect(customer.getAccounts()).toEqual([]);
        });

        it("顧客が見つからない場合は CustomerNotFoundException で、番号は払い出さない", async () => {
            // Act & Assert
            await expect(
                service.openAccount(new OpenAccountCommand(individual().getNationalId()))
            ).rejects.toThrow(CustomerNotFoundException);
            expect(mockSaveAccountPort.nextAccountNumber).not.toHaveBeenCalled();
        });
    });

    describe("getStatement", () => {
        it("自分の口座の明細を返す（種類で絞り込み可）", async () => {
            // Arrange
            const customer = individual();
            const account = checkingAccount(customer, clock.now, 3);
            new Deposit(Money.of(1000)).apply(account);
            new Withdrawal(Money.of(250)).apply(account);
            vi.mocked(mockLoadCustomerPort.findCustomerByNationalId).mockResolvedValue(customer);
            vi.mocked(mockLoadAccountPort.findAccountByNumber).mockResolvedValue(account);

            // Act
            const all = await service.getStatement(customer.getNationalId(), new AccountNumber(3));
            const withdrawals = await service.getStatement(customer.getNationalId(), new AccountNumber(3), "withdrawal");

            // Assert
            expect(all.branchCode).toBe("0001");
            expect(all.accountNumber.getValue()).toBe(3);
            expect(all.holderName).toBe("Ana Souza");
            expect(all.balance.getAmount()).toBe(750n);
            expect(all.entries.map((e) => e.kind)).toEqual(["Deposit", "Withdrawal"]);
            expect(withdrawals.entries.map((e) => e.amount.getAmount())).toEqual([250n]);
        });

        it("顧客が見つからない場合は CustomerNotFoundException", async () => {
            await expect(
                service.getStatement(individual().getNationalId(), new AccountNumber(1))
            ).rejects.toThrow(CustomerNotFoundException);
        });

        it("口座が見つからない場合は AccountNotFoundException", async () => {
            const customer = individual();
            vi.mocked(mockLoadCustomerPort.findCustomerByNationalId).mockResolvedValue(customer);

            await expect(
                service.getStatement(customer.getNationalId(), new AccountNumber(9))
            ).rejects.toThrow(AccountNotFoundException);
        });

        it("他人の口座の場合は AccountNotOwnedException", async () => {
            // Arrange
            const owner = individual("11111111111");
            const other = individual("22222222222");
            const account = checkingAccount(owner, clock.now);
            vi.mocked(mockLoadCustomerPort.findCustomerByNationalId).mockResolvedValue(other);
            vi.mocked(mockLoadAccountPort.findAccountByNumber).mockResolvedValue(account);

            // Act & Assert
            await expect(
                service.getStatement(other.getNationalId(), new AccountNumber(1))
            ).rejects.toThrow(AccountNotOwnedException);
        });
    });

    it("listAccounts は台帳の一覧をそのまま返す", async () => {
        const account = checkingAccount(individual(), clock.now);
        vi.mocked(mockLoadAccountPort.findAllAccounts).mockResolvedValue([account]);

        await expect(service.listAccounts()).resolves.toEqual([account]);
    });
});
