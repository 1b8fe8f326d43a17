import { z } from 'zod';

/**
 * CLI専用の入力モデル
 * 入力はすべて文字列。ドメインの値オブジェクトに変換する前にここで形式を確認する
 */

export const NationalIdInputSchema = z
  .string()
  .trim()
  .regex(/^\d{11}$/, 'CPF must contain exactly 11 digits');

/**
 * 正の10進数（小数点は . または , で2桁まで）
 */
export const AmountInputSchema = z
  .string()
  .trim()
  .regex(/^\d+(?:[.,]\d{1,2})?$/, 'amount must be a positive decimal number')
  .refine((value) => /[1-9]/.test(value), 'amount must be greater than zero');

export const StatementFilterInputSchema = z
  .string()
  .trim()
  .refine(
    (value) => ['', 'deposit', 'withdrawal'].includes(value.toLowerCase()),
    'type must be "deposit", "withdrawal" or empty'
  );

/**
 * 口座の選択肢（0始まりのインデックス）
 */
export function accountChoiceSchema(accountCount: number) {
  return z
    .string()
    .trim()
    .regex(/^\d+$/, 'choice must be a number')
    .transform(Number)
    .pipe(z.number().int().max(accountCount - 1, 'choice is out of range'));
}
