import type {AccountNumber} from '../model/AccountNumber';
import {BankingException} from './BankingException';

/**
 * 口座が見つからない場合の例外
 *
 * accountNumber が null の場合は「顧客が口座を1つも持っていない」ことを表す
 */
export class AccountNotFoundException extends BankingException {
    readonly code = 'ACCOUNT_NOT_FOUND' as const;

    constructor(public readonly accountNumber: AccountNumber | null) {
        super(
            accountNumber
                ? `Account not found: ${accountNumber.toString()}`
                : 'Customer has no account'
        );
    }
}
