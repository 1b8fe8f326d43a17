import {z} from 'zod';
import {Money} from '../banking/application/domain/model/Money';
import type {EnvBindings} from '../types/bindings';
import type {AppConfig} from './types';

const EnvSchema = z.object({
    BANK_BRANCH_CODE: z
        .string()
        .regex(/^\d{4}$/, 'BANK_BRANCH_CODE must be 4 digits')
        .default('0001'),
    CHECKING_WITHDRAWAL_LIMIT: z
        .string()
        .regex(/^\d+(?:[.,]\d{1,2})?$/, 'CHECKING_WITHDRAWAL_LIMIT must be a positive decimal')
        .refine((value) => /[1-9]/.test(value), 'CHECKING_WITHDRAWAL_LIMIT must be greater than zero')
        .default('500.00'),
    CHECKING_MAX_WITHDRAWALS: z.coerce
        .number()
        .int('CHECKING_MAX_WITHDRAWALS must be an integer')
        .positive('CHECKING_MAX_WITHDRAWALS must be positive')
        .default(3),
});

/**
 * 環境変数を検証して AppConfig に変換する
 *
 * 未設定の項目はデフォルト値（支店 0001、限度額 R$ 500.00、1日3回）
 *
 * @throws Error 値が不正な場合（起動時に失敗させる）
 */
export function loadConfig(env: EnvBindings): AppConfig {
    const result = EnvSchema.safeParse(env);

    if (!result.success) {
        throw new Error(
            `Invalid configuration: ${result.error.issues.map((e) => e.message).join(', ')}`
        );
    }

    return {
        branchCode: result.data.BANK_BRANCH_CODE,
        checkingWithdrawalLimit: Money.parse(result.data.CHECKING_WITHDRAWAL_LIMIT),
        checkingMaxWithdrawals: result.data.CHECKING_MAX_WITHDRAWALS,
    };
}
