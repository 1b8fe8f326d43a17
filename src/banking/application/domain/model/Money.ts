/**
 * お金を表す値オブジェクト
 * 金額は最小単位（センターボ）の整数で保持する
 *
 * 例: R$ 12.50 → 1250n
 */
export class Money {
  public static readonly ZERO = Money.of(0);

  private static readonly DECIMAL_PATTERN = /^(-)?(\d+)(?:[.,](\d{1,2}))?$/;

  private constructor(private readonly amount: bigint) {}

  /**
   * 最小単位の整数からMoneyインスタンスを生成
   */
  static of(value: number | bigint): Money {
    return new Money(BigInt(value));
  }

  /**
   * 10進数の文字列（"12.50" や "12,50"）からMoneyインスタンスを生成
   *
   * 小数点以下は2桁まで。それ以外の形式はエラー
   */
  static parse(value: string): Money {
    const match = Money.DECIMAL_PATTERN.exec(value.trim());
    if (!match) {
      throw new Error(`Invalid monetary value: "${value}"`);
    }

    const [, sign, units, fraction = ''] = match;
    const cents = BigInt(units) * 100n + BigInt(fraction.padEnd(2, '0'));

    return new Money(sign ? -cents : cents);
  }

  isPositive(): boolean {
    return this.amount > 0n;
  }

  isGreaterThan(other: Money): boolean {
    return this.amount > other.amount;
  }

  plus(other: Money): Money {
    return new Money(this.amount + other.amount);
  }

  minus(other: Money): Money {
    return new Money(this.amount - other.amount);
  }

  /**
   * 金額を取得（最小単位）
   */
  getAmount(): bigint {
    return this.amount;
  }

  /**
   * 小数点付きの文字列表現（例: "12.50", "-0.05"）
   */
  toDecimalString(): string {
    const negative = this.amount < 0n;
    const absolute = negative ? -this.amount : this.amount;
    const units = absolute / 100n;
    const cents = (absolute % 100n).toString().padStart(2, '0');

    return `${negative ? '-' : ''}${units.toString()}.${cents}`;
  }

  /**
   * 表示用の文字列（例: "R$ 12.50"）
   */
  format(): string {
    return `R$ ${this.toDecimalString()}`;
  }

  toString(): string {
    return this.amount.toString();
  }
}
