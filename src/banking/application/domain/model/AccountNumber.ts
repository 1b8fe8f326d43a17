/**
 * 口座番号（値オブジェクト）
 * 台帳が1から順番に採番する
 */
export class AccountNumber {
  constructor(private readonly value: number) {
    if (!Number.isInteger(value) || value < 1) {
      throw new Error(`Account number must be a positive integer: ${String(value)}`);
    }
  }

  getValue(): number {
    return this.value;
  }

  next(): AccountNumber {
    return new AccountNumber(this.value + 1);
  }

  toString(): string {
    return this.value.toString();
  }
}
