import type {Money} from '../model/Money';
import {BankingException} from './BankingException';

/**
 * 金額不正例外（0以下の金額）
 */
export class InvalidAmountException extends BankingException {
    readonly code = 'INVALID_AMOUNT' as const;

    constructor(public readonly attemptedAmount: Money) {
        super(`Amount must be positive: ${attemptedAmount.toDecimalString()}`);
    }
}
