import type {Money} from '../model/Money';
import {BankingException} from './BankingException';

/**
 * 1回あたりの出金限度額を超えた場合の例外
 */
export class LimitExceededException extends BankingException {
    readonly code = 'LIMIT_EXCEEDED' as const;

    constructor(
        public readonly limit: Money,
        public readonly attemptedAmount: Money
    ) {
        super(
            `Withdrawal limit exceeded: tried to withdraw ${attemptedAmount.toDecimalString()} but limit is ${limit.toDecimalString()}`
        );
    }
}
