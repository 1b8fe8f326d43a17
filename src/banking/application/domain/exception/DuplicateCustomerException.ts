import type {NationalId} from '../model/NationalId';
import {BankingException} from './BankingException';

export class DuplicateCustomerException extends BankingException {
    readonly code = 'DUPLICATE_CUSTOMER' as const;

    constructor(public readonly nationalId: NationalId) {
        super(`A customer with national ID ${nationalId.toString()} already exists`);
    }
}
