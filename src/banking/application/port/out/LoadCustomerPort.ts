import type {Customer} from '../../domain/model/Customer';
import type {NationalId} from '../../domain/model/NationalId';

/**
 * 顧客を読み込むための出力ポート
 * 台帳アダプターが実装する
 */
export interface LoadCustomerPort {
    /**
     * @returns 見つからなければ null
     */
    findCustomerByNationalId(nationalId: NationalId): Promise<Customer | null>;

    /**
     * 登録順に全顧客を返す
     */
    findAllCustomers(): Promise<readonly Customer[]>;
}

/**
 * DI用のシンボル
 */
export const LoadCustomerPortToken = Symbol('LoadCustomerPort');
