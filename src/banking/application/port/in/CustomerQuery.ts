import type {Customer} from '../../domain/model/Customer';
import type {NationalId} from '../../domain/model/NationalId';

/**
 * 顧客の照会（入力ポート）
 */
export interface CustomerQuery {
    /**
     * @throws CustomerNotFoundException
     */
    findCustomer(nationalId: NationalId): Promise<Customer>;

    listCustomers(): Promise<readonly Customer[]>;
}

export const CustomerQueryToken = Symbol('CustomerQuery');
