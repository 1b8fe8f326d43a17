import {z} from 'zod';
import {InvalidAmountException} from '../exception/InvalidAmountException';
import type {Account} from './Account';
import type {TransactionKind} from './History';
import {Money} from './Money';
import type {OperationResult} from './OperationResult';

const TransactionAmountSchema = z
    .custom<Money>((val) => val instanceof Money, {
        message: 'amount must be a Money instance',
    })
    .refine((money) => money.isPositive(), {
        message: 'amount must be positive',
    });

/**
 * 取引（入金・出金）
 *
 * 不変オブジェクト。apply で口座に適用し、成功した場合のみ口座の履歴に記録する
 */
export interface Transaction {
    readonly kind: TransactionKind;
    readonly amount: Money;

    apply(account: Account): OperationResult;
}

/**
 * 金額は生成時点で正でなければならない
 * （口座側でも同じチェックを独立して行う）
 */
function validateAmount(amount: Money): Money {
    if (!TransactionAmountSchema.safeParse(amount).success) {
        throw new InvalidAmountException(amount);
    }
    return amount;
}

export class Deposit implements Transaction {
    readonly kind = 'Deposit' as const;
    readonly amount: Money;

    /**
     * @throws InvalidAmountException 金額が0以下の場合
     */
    constructor(amount: Money) {
        this.amount = validateAmount(amount);
    }

    apply(account: Account): OperationResult {
        const result = account.deposit(this.amount);

        if (result.success) {
            account.getHistory().record(this.kind, this.amount);
        }

        return result;
    }
}

export class Withdrawal implements Transaction {
    readonly kind = 'Withdrawal' as const;
    readonly amount: Money;

    /**
     * @throws InvalidAmountException 金額が0以下の場合
     */
    constructor(amount: Money) {
        this.amount = validateAmount(amount);
    }

    apply(account: Account): OperationResult {
        const result = account.withdraw(this.amount);

        if (result.success) {
            account.getHistory().record(this.kind, this.amount);
        }

        return result;
    }
}

export function createTransaction(kind: TransactionKind, amount: Money): Transaction {
    return kind === 'Deposit' ? new Deposit(amount) : new Withdrawal(amount);
}
