import type {Account} from '../../domain/model/Account';
import type {OpenAccountCommand} from './OpenAccountCommand';

/**
 * 口座開設ユースケース（入力ポート）
 */
export interface OpenAccountUseCase {
    /**
     * 顧客に当座預金口座を開設する
     *
     * @throws CustomerNotFoundException
     */
    openAccount(command: OpenAccountCommand): Promise<Account>;
}

export const OpenAccountUseCaseToken = Symbol('OpenAccountUseCase');
