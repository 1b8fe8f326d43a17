// ━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━
// InsufficientFundsException（残高不足）
// ━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━
//
// 出金額が現在の残高を上回った場合の失敗理由。
// 口座番号・試行金額・現在残高を保持するので、
// 呼び出し側で「残高 R$ 800.00 に対して R$ 900.00 の出金」のような表示ができる。
// ━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━

import type {AccountNumber} from '../model/AccountNumber';
import type {Money} from '../model/Money';
import {BankingException} from './BankingException';

export class InsufficientFundsException extends BankingException {
    readonly code = 'INSUFFICIENT_FUNDS' as const;

    constructor(
        public readonly accountNumber: AccountNumber,
        public readonly attemptedAmount: Money,
        public readonly currentBalance: Money
    ) {
        super(
            `Insufficient funds in account ${accountNumber.toString()}: ` +
            `attempted to withdraw ${attemptedAmount.toDecimalString()}, ` +
            `but current balance is ${currentBalance.toDecimalString()}`
        );
    }
}
