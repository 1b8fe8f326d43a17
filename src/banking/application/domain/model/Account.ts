import {InsufficientFundsException} from '../exception/InsufficientFundsException';
import {InvalidAmountException} from '../exception/InvalidAmountException';
import {LimitExceededException} from '../exception/LimitExceededException';
import {WithdrawalCountExceededException} from '../exception/WithdrawalCountExceededException';
import type {AccountNumber} from './AccountNumber';
import type {Clock} from './Clock';
import {systemClock} from './Clock';
import type {Customer} from './Customer';
import {History} from './History';
import {Money} from './Money';
import type {OperationResult} from './OperationResult';
import {failed, succeeded} from './OperationResult';
import type {WithdrawalPolicy} from './WithdrawalPolicy';
import {startOfPeriod, UNRESTRICTED_POLICY} from './WithdrawalPolicy';

/**
 * 口座種別
 * - checking: 当座預金（出金限度額と1日の出金回数上限あり）
 * - standard: 制限なし
 */
export type AccountKind = 'standard' | 'checking';

export interface OpenAccountOptions {
    kind?: AccountKind;
    policy?: WithdrawalPolicy;
    branchCode?: string;
    clock?: Clock;
}

/**
 * 銀行口座
 *
 * 残高を変更できるのは deposit / withdraw だけ。
 * 履歴への記録は呼び出し側（Transaction）の責務で、
 * このクラスは残高の更新と出金可否の判定のみを行う。
 */
export class Account {
    static readonly DEFAULT_BRANCH_CODE = '0001';

    private balance: Money = Money.ZERO;
    private readonly history: History;

    private constructor(
        private readonly number: AccountNumber,
        private readonly customer: Customer,
        private readonly kind: AccountKind,
        private readonly policy: WithdrawalPolicy,
        private readonly branchCode: string,
        private readonly clock: Clock
    ) {
        this.history = new History(clock);
    }

    /**
     * 口座を開設する（残高0、履歴なし）
     */
    static open(
        customer: Customer,
        number: AccountNumber,
        options: OpenAccountOptions = {}
    ): Account {
        return new Account(
            number,
            customer,
            options.kind ?? 'standard',
            options.policy ?? UNRESTRICTED_POLICY,
            options.branchCode ?? Account.DEFAULT_BRANCH_CODE,
            options.clock ?? systemClock
        );
    }

    /**
     * 当座預金口座を開設する
     */
    static openChecking(
        customer: Customer,
        number: AccountNumber,
        policy: WithdrawalPolicy,
        options: Omit<OpenAccountOptions, 'kind' | 'policy'> = {}
    ): Account {
        return Account.open(customer, number, {...options, kind: 'checking', policy});
    }

    getNumber(): AccountNumber {
        return this.number;
    }

    getBranchCode(): string {
        return this.branchCode;
    }

    getCustomer(): Customer {
        return this.customer;
    }

    getKind(): AccountKind {
        return this.kind;
    }

    getPolicy(): WithdrawalPolicy {
        return this.policy;
    }

    getBalance(): Money {
        return this.balance;
    }

    getHistory(): History {
        return this.history;
    }

    deposit(money: Money): OperationResult {
        if (!money.isPositive()) {
            return failed(new InvalidAmountException(money));
        }

        this.balance = this.balance.plus(money);
        return succeeded(this.balance);
    }

    /**
     * 出金する
     *
     * 判定順序：
     * 1. 金額不正（0以下）
     * 2. 残高不足
     * 3. 1回あたりの限度額超過
     * 4. 当日の出金回数の上限到達（履歴に記録済みの出金のみを数える）
     */
    withdraw(money: Money): OperationResult {
        if (!money.isPositive()) {
            return failed(new InvalidAmountException(money));
        }

        if (money.isGreaterThan(this.balance)) {
            return failed(new InsufficientFundsException(this.number, money, this.balance));
        }

        const {perWithdrawalLimit, maxWithdrawalsPerPeriod} = this.policy;

        if (perWithdrawalLimit && money.isGreaterThan(perWithdrawalLimit)) {
            return failed(new LimitExceededException(perWithdrawalLimit, money));
        }

        if (
            maxWithdrawalsPerPeriod !== undefined &&
            this.countWithdrawalsInPeriod() >= maxWithdrawalsPerPeriod
        ) {
            return failed(new WithdrawalCountExceededException(maxWithdrawalsPerPeriod));
        }

        this.balance = this.balance.minus(money);
        return succeeded(this.balance);
    }

    private countWithdrawalsInPeriod(): number {
        return this.history.countOf('Withdrawal', startOfPeriod(this.clock()));
    }
}
