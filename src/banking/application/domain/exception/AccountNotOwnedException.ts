import type {AccountNumber} from '../model/AccountNumber';
import type {NationalId} from '../model/NationalId';
import {BankingException} from './BankingException';

/**
 * 顧客が所有していない口座に対して取引しようとした場合の例外
 */
export class AccountNotOwnedException extends BankingException {
    readonly code = 'ACCOUNT_NOT_OWNED' as const;

    constructor(
        public readonly accountNumber: AccountNumber,
        public readonly nationalId: NationalId
    ) {
        super(
            `Account ${accountNumber.toString()} does not belong to customer ${nationalId.toString()}`
        );
    }
}
