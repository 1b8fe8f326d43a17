import {z} from 'zod';
import {InvalidNationalIdException} from '../exception/InvalidNationalIdException';

const NationalIdSchema = z.string().regex(/^\d{11}$/);

/**
 * CPF（個人納税者番号）を表す値オブジェクト
 *
 * 書式は「数字11桁のみ」。区切り記号（. や -）は受け付けない
 */
export class NationalId {
  private constructor(private readonly value: string) {}

  /**
   * @throws InvalidNationalIdException 11桁の数字でない場合
   */
  static of(value: string): NationalId {
    if (!NationalIdSchema.safeParse(value).success) {
      throw new InvalidNationalIdException(value);
    }

    return new NationalId(value);
  }

  getValue(): string {
    return this.value;
  }

  toString(): string {
    return this.value;
  }
}
