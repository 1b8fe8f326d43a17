import type {Money} from './Money';

/**
 * 口座の出金ルール
 *
 * 口座種別ごとにサブクラスを作る代わりに、このポリシーを口座に持たせる。
 * 項目が省略されている場合、そのルールは適用しない。
 */
export interface WithdrawalPolicy {
    /** 1回あたりの出金限度額 */
    readonly perWithdrawalLimit?: Money;
    /** 1期間（1日）あたりの出金回数の上限 */
    readonly maxWithdrawalsPerPeriod?: number;
}

export const UNRESTRICTED_POLICY: WithdrawalPolicy = Object.freeze({});

/**
 * 出金回数を数える期間の開始時刻（ローカル時刻の当日0時）
 */
export function startOfPeriod(now: Date): Date {
    return new Date(now.getFullYear(), now.getMonth(), now.getDate());
}
