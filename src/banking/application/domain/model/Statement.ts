import type {Account} from './Account';
import type {AccountNumber} from './AccountNumber';
import type {HistoryEntry} from './History';
import type {Money} from './Money';

/**
 * 口座の取引明細
 */
export interface Statement {
    readonly branchCode: string;
    readonly accountNumber: AccountNumber;
    readonly holderName: string;
    readonly entries: readonly HistoryEntry[];
    readonly balance: Money;
}

/**
 * 口座の現在の状態から明細を作る
 *
 * @param filterKind 取引の種類で絞り込む（大文字・小文字は区別しない）
 */
export function statementOf(account: Account, filterKind?: string): Statement {
    return {
        branchCode: account.getBranchCode(),
        accountNumber: account.getNumber(),
        holderName: account.getCustomer().getName(),
        entries: [...account.getHistory().entries(filterKind)],
        balance: account.getBalance(),
    };
}
