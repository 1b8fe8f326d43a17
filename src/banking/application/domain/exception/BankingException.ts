/**
 * 銀行ドメインのエラーコード
 *
 * 呼び出し側（CLIなど）はメッセージではなくこのコードで失敗理由を判別する
 */
export type BankingErrorCode =
    | 'INVALID_AMOUNT'
    | 'INSUFFICIENT_FUNDS'
    | 'LIMIT_EXCEEDED'
    | 'WITHDRAWAL_COUNT_EXCEEDED'
    | 'CUSTOMER_NOT_FOUND'
    | 'ACCOUNT_NOT_FOUND'
    | 'ACCOUNT_NOT_OWNED'
    | 'DUPLICATE_CUSTOMER'
    | 'INVALID_NATIONAL_ID'
    | 'INVALID_COMMAND';

/**
 * 銀行ドメインの例外の基底クラス
 *
 * 【使い分け】
 * - 口座への入出金: 例外を投げずに結果オブジェクトの error として返す
 * - 値オブジェクト・コマンドの生成、検索の失敗: throw する
 */
export abstract class BankingException extends Error {
    abstract readonly code: BankingErrorCode;

    protected constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}
