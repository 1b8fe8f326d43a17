import {BankingException} from './BankingException';

/**
 * コマンドのバリデーションに失敗した場合の例外
 */
export class InvalidCommandException extends BankingException {
    readonly code = 'INVALID_COMMAND' as const;

    constructor(
        commandName: string,
        public readonly issues: readonly string[]
    ) {
        super(`Invalid ${commandName}: ${issues.join(', ')}`);
    }
}
