import { describe, it, expect } from "vitest";
import {AccountNotOwnedException} from "../../src/banking/application/domain/exception/AccountNotOwnedException";
import {Account} from "../../src/banking/application/domain/model/Account";
import {AccountNumber} from "../../src/banking/application/domain/model/AccountNumber";
import {Money} from "../../src/banking/application/domain/model/Money";
import {Deposit} from "../../src/banking/application/domain/model/Transaction";
import {checkingAccount, errorCodeOf, individual, TestClock} from "../helpers/fixtures";


describe("Customer", () => {
    it("個人顧客の本人情報を保持する", () => {
        // Act
        const customer = individual("98765432100", "Bruno Lima");

        // Assert
        expect(customer.getIdentity()).toMatchObject({
            kind: "individual",
            name: "Bruno Lima",
            birthDate: "29-08-1994",
        });
        expect(customer.getNationalId().getValue()).toBe("98765432100");
        expect(customer.getAddress()).toBe("Rua A, 123 - Centro - Recife/PE");
        expect(customer.getAccounts()).toEqual([]);
    });

    it("口座は追加した順に並ぶ", () => {
        // Arrange
        const customer = individual();
        const clock = new TestClock();

        // Act
        const first = checkingAccount(customer, clock.now, 1);
        const second = checkingAccount(customer, clock.now, 2);

        // Assert
        expect(customer.getAccounts()).toEqual([first, second]);
    });

    it("getAccounts の戻り値を変更しても顧客の口座は変わらない", () => {
        const customer = individual();
        checkingAccount(customer, new TestClock().now);

        const copy = [...customer.getAccounts()];
        copy.pop();

        expect(customer.getAccounts()).toHaveLength(1);
    });

    it("execute は自分の口座に取引を適用する", () => {
        // Arrange
        const customer = individual();
        const account = checkingAccount(customer, new TestClock().now);

        // Act
        const result = customer.execute(account, new Deposit(Money.of(100)));

        // Assert
        expect(result.success).toBe(true);
        expect(account.getBalance().getAmount()).toBe(100n);
        expect(account.getHistory().size).toBe(1);
    });

    it("他人の口座への取引は ACCOUNT_NOT_OWNED で失敗し、何も適用しない", () => {
        // Arrange
        const owner = individual("11111111111", "Ana Souza");
        const other = individual("22222222222", "Carlos Dias");
        const account = Account.open(owner, new AccountNumber(7));

        // Act
        const result = other.execute(account, new Deposit(Money.of(100)));

        // Assert
        expect(errorCodeOf(result)).toBe("ACCOUNT_NOT_OWNED");
        expect(account.getBalance().getAmount()).toBe(0n);
        expect(account.getHistory().size).toBe(0);

        if (!result.success) {
            expect(result.error).toBeInstanceOf(AccountNotOwnedException);
            expect(result.error.message).toBe("Account 7 does not belong to customer 22222222222");
        }
    });
});
