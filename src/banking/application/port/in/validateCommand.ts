import type {z} from 'zod';
import {InvalidCommandException} from '../../domain/exception/InvalidCommandException';

/**
 * コマンドのバリデーション
 *
 * @throws InvalidCommandException スキーマに合わない場合
 */
export function validateCommand<T extends z.ZodTypeAny>(
    commandName: string,
    schema: T,
    input: z.input<T>
): void {
    const result = schema.safeParse(input);

    if (!result.success) {
        throw new InvalidCommandException(
            commandName,
            result.error.issues.map((e) => e.message)
        );
    }
}
