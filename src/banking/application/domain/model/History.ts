import type {Clock} from './Clock';
import {systemClock} from './Clock';
import type {Money} from './Money';

export type TransactionKind = 'Deposit' | 'Withdrawal';

/**
 * 取引履歴の1件
 */
export interface HistoryEntry {
    readonly kind: TransactionKind;
    readonly amount: Money;
    readonly timestamp: Date;
}

/**
 * 口座ごとの取引履歴
 *
 * 【ルール】
 * - 追記のみ（削除・更新なし）
 * - 追加した順序を保持する
 * - 記録されるのは実際に適用された取引だけ（失敗した試行は記録しない）
 *
 * 出金回数の上限チェックにも使われるので、
 * 「履歴に載っている = 成功した取引」という前提を崩さないこと。
 */
export class History {
    private readonly items: HistoryEntry[] = [];

    constructor(private readonly clock: Clock = systemClock) {}

    /**
     * 取引を現在時刻で記録する
     */
    record(kind: TransactionKind, amount: Money): HistoryEntry {
        const entry: HistoryEntry = Object.freeze({
            kind,
            amount,
            timestamp: this.clock(),
        });

        this.items.push(entry);
        return entry;
    }

    /**
     * 履歴を挿入順に返す
     *
     * 返り値は遅延評価のイテラブルで、何度でも最初から走査できる。
     * filterKind を渡すと種類で絞り込む（大文字・小文字は区別しない）
     *
     * @param filterKind 'Deposit' / 'withdrawal' など
     */
    entries(filterKind?: string): Iterable<HistoryEntry> {
        const items = this.items;
        const wanted = filterKind?.toLowerCase();

        return {
            *[Symbol.iterator](): Generator<HistoryEntry> {
                for (const entry of items) {
                    if (wanted === undefined || entry.kind.toLowerCase() === wanted) {
                        yield entry;
                    }
                }
            },
        };
    }

    /**
     * 指定した種類の件数を数える
     *
     * @param since この時刻以降の取引だけを数える（省略時は全件）
     */
    countOf(kind: TransactionKind, since?: Date): number {
        let count = 0;
        for (const entry of this.entries(kind)) {
            if (since === undefined || entry.timestamp >= since) {
                count++;
            }
        }
        return count;
    }

    get size(): number {
        return this.items.length;
    }
}
