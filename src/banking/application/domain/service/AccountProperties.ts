import type {Money} from '../model/Money';
import type {WithdrawalPolicy} from '../model/WithdrawalPolicy';

/**
 * 口座開設の設定値（支店コード、当座預金の出金ルール）
 * 環境変数から作られ、DIコンテナに登録される
 */
export class AccountProperties {
  constructor(
    public readonly branchCode: string,
    public readonly checkingWithdrawalLimit: Money,
    public readonly checkingMaxWithdrawals: number
  ) {}

  checkingPolicy(): WithdrawalPolicy {
    return {
      perWithdrawalLimit: this.checkingWithdrawalLimit,
      maxWithdrawalsPerPeriod: this.checkingMaxWithdrawals,
    };
  }
}

/**
 * DI用のシンボル
 */
export const AccountPropertiesToken = Symbol('AccountProperties');
