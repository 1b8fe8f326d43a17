import {BankingException} from './BankingException';

/**
 * CPFの形式が不正な場合の例外（11桁の数字のみ有効）
 */
export class InvalidNationalIdException extends BankingException {
    readonly code = 'INVALID_NATIONAL_ID' as const;

    constructor(public readonly value: string) {
        super(`Invalid national ID "${value}": it must contain exactly 11 digits`);
    }
}
