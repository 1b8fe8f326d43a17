import type {Account} from '../../domain/model/Account';
import type {AccountNumber} from '../../domain/model/AccountNumber';

/**
 * 口座を読み込むための出力ポート
 * 台帳アダプターが実装する
 */
export interface LoadAccountPort {
    /**
     * @returns 見つからなければ null
     */
    findAccountByNumber(accountNumber: AccountNumber): Promise<Account | null>;

    /**
     * 口座番号順に全口座を返す
     */
    findAllAccounts(): Promise<readonly Account[]>;
}

/**
 * DI用のシンボル
 */
export const LoadAccountPortToken = Symbol('LoadAccountPort');
