import type {Customer} from '../../domain/model/Customer';
import type {RegisterCustomerCommand} from './RegisterCustomerCommand';

/**
 * 顧客登録ユースケース（入力ポート）
 */
export interface RegisterCustomerUseCase {
    /**
     * @throws DuplicateCustomerException 同じCPFの顧客が既に存在する場合
     */
    registerCustomer(command: RegisterCustomerCommand): Promise<Customer>;
}

export const RegisterCustomerUseCaseToken = Symbol('RegisterCustomerUseCase');
