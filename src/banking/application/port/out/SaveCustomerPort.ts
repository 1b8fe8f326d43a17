import type {Customer} from '../../domain/model/Customer';

/**
 * 顧客を保存するための出力ポート
 */
export interface SaveCustomerPort {
    saveCustomer(customer: Customer): Promise<void>;
}

/**
 * DI用のシンボル
 */
export const SaveCustomerPortToken = Symbol('SaveCustomerPort');
