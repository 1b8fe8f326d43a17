import {z} from 'zod';
import {AccountNumber} from '../../domain/model/AccountNumber';
import type {TransactionKind} from '../../domain/model/History';
import {Money} from '../../domain/model/Money';
import {NationalId} from '../../domain/model/NationalId';
import {validateCommand} from './validateCommand';

const ExecuteTransactionCommandSchema = z.object({
    kind: z.enum(['Deposit', 'Withdrawal']),
    nationalId: z.custom<NationalId>((val) => val instanceof NationalId, {
        message: 'nationalId must be a NationalId instance',
    }),
    accountNumber: z.custom<AccountNumber>((val) => val instanceof AccountNumber, {
        message: 'accountNumber must be an AccountNumber instance',
    }),
    money: z.custom<Money>((val) => val instanceof Money, {
        message: 'money must be a Money instance',
    }),
});

/**
 * 入出金コマンド
 *
 * 金額の正負はここでは見ない。
 * 取引（Deposit / Withdrawal）の生成時に InvalidAmountException になる
 */
export class ExecuteTransactionCommand {
    constructor(
        public readonly kind: TransactionKind,
        public readonly nationalId: NationalId,
        public readonly accountNumber: AccountNumber,
        public readonly money: Money
    ) {
        validateCommand('ExecuteTransactionCommand', ExecuteTransactionCommandSchema, {
            kind,
            nationalId,
            accountNumber,
            money,
        });
    }
}
