import type {Money} from '../banking/application/domain/model/Money';

/**
 * 環境変数から組み立てたアプリケーション設定
 */
export interface AppConfig {
    branchCode: string;
    checkingWithdrawalLimit: Money;
    checkingMaxWithdrawals: number;
}

/**
 * DI用のトークン
 */
export const ClockToken = Symbol('Clock');
