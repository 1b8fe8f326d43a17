/**
 * アプリケーションが読む環境変数の型定義
 * .env（dotenv）または実行時の環境変数から渡される
 */
export interface EnvBindings {
    BANK_BRANCH_CODE?: string;
    CHECKING_WITHDRAWAL_LIMIT?: string;
    CHECKING_MAX_WITHDRAWALS?: string;
}
