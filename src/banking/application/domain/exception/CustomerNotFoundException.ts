import type {NationalId} from '../model/NationalId';
import {BankingException} from './BankingException';

export class CustomerNotFoundException extends BankingException {
    readonly code = 'CUSTOMER_NOT_FOUND' as const;

    constructor(public readonly nationalId: NationalId) {
        super(`Customer not found: ${nationalId.toString()}`);
    }
}
