import {Account} from "../../src/banking/application/domain/model/Account";
import {AccountNumber} from "../../src/banking/application/domain/model/AccountNumber";
import type {Clock} from "../../src/banking/application/domain/model/Clock";
import {Customer} from "../../src/banking/application/domain/model/Customer";
import {Money} from "../../src/banking/application/domain/model/Money";
import {NationalId} from "../../src/banking/application/domain/model/NationalId";
import type {OperationResult} from "../../src/banking/application/domain/model/OperationResult";
import type {WithdrawalPolicy} from "../../src/banking/application/domain/model/WithdrawalPolicy";

/**
 * テスト用の共通データ
 */

export const CHECKING_POLICY: WithdrawalPolicy = {
    perWithdrawalLimit: Money.of(500),
    maxWithdrawalsPerPeriod: 3,
};

/**
 * 時刻を進められる時計（ローカル時刻で指定する）
 */
export class TestClock {
    private current: Date;

    constructor(start: Date = new Date(2026, 9, 19, 10, 0, 0)) {
        this.current = start;
    }

    readonly now: Clock = () => new Date(this.current.getTime());

    set(date: Date): void {
        this.current = date;
    }
}

export function individual(
    nationalId = "12345678901",
    name = "Ana Souza"
): Customer {
    return Customer.individual({
        name,
        birthDate: "29-08-1994",
        nationalId: NationalId.of(nationalId),
        address: "Rua A, 123 - Centro - Recife/PE",
    });
}

export function checkingAccount(
    customer: Customer,
    clock: Clock,
    number = 1
): Account {
    const account = Account.openChecking(customer, new AccountNumber(number), CHECKING_POLICY, {clock});
    customer.addAccount(account);
    return account;
}

/**
 * 失敗理由のコード（成功なら null）
 */
export function errorCodeOf(result: OperationResult): string | null {
    return result.success ? null : result.error.code;
}
