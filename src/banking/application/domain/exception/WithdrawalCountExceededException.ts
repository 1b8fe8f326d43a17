import {BankingException} from './BankingException';

/**
 * 期間内の出金回数が上限に達している場合の例外
 */
export class WithdrawalCountExceededException extends BankingException {
    readonly code = 'WITHDRAWAL_COUNT_EXCEEDED' as const;

    constructor(public readonly maxWithdrawals: number) {
        super(`Maximum number of withdrawals (${String(maxWithdrawals)}) exceeded`);
    }
}
