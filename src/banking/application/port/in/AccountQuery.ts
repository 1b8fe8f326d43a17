import type {Account} from '../../domain/model/Account';
import type {AccountNumber} from '../../domain/model/AccountNumber';
import type {NationalId} from '../../domain/model/NationalId';
import type {Statement} from '../../domain/model/Statement';

/**
 * 口座の照会（入力ポート）
 */
export interface AccountQuery {
    listAccounts(): Promise<readonly Account[]>;

    /**
     * @param filterKind 'deposit' / 'withdrawal' で絞り込む（省略時は全件）
     * @throws CustomerNotFoundException
     * @throws AccountNotFoundException
     * @throws AccountNotOwnedException 他人の口座の明細を要求した場合
     */
    getStatement(
        nationalId: NationalId,
        accountNumber: AccountNumber,
        filterKind?: string
    ): Promise<Statement>;
}

export const AccountQueryToken = Symbol('AccountQuery');
