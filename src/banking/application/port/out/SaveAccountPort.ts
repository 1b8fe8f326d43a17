import type {Account} from '../../domain/model/Account';
import type {AccountNumber} from '../../domain/model/AccountNumber';

/**
 * 口座の採番と保存を行う出力ポート
 */
export interface SaveAccountPort {
    /**
     * 次の口座番号を払い出す（1から連番）
     */
    nextAccountNumber(): Promise<AccountNumber>;

    saveAccount(account: Account): Promise<void>;
}

/**
 * DI用のシンボル
 */
export const SaveAccountPortToken = Symbol('SaveAccountPort');
