import {inject, injectable} from 'tsyringe';
import {AccountNotFoundException} from '../domain/exception/AccountNotFoundException';
import {CustomerNotFoundException} from '../domain/exception/CustomerNotFoundException';
import type {OperationResult} from '../domain/model/OperationResult';
import {createTransaction} from '../domain/model/Transaction';
import type {ExecuteTransactionCommand} from '../port/in/ExecuteTransactionCommand';
import type {ExecuteTransactionUseCase} from '../port/in/ExecuteTransactionUseCase';
import type {LoadAccountPort} from '../port/out/LoadAccountPort';
import {LoadAccountPortToken} from '../port/out/LoadAccountPort';
import type {LoadCustomerPort} from '../port/out/LoadCustomerPort';
import {LoadCustomerPortToken} from '../port/out/LoadCustomerPort';

/**
 * 入出金ユースケースの実装
 *
 * 【処理の流れ】
 * 1. 取引を生成（金額が0以下ならここで例外）
 * 2. 顧客と口座を読み込み
 * 3. 顧客に取引を実行させる（所有者チェック → 口座のルール → 履歴への記録）
 *
 * 口座はメモリ上のオブジェクトをそのまま更新するので、保存処理は不要
 */
@injectable()
export class TransactionApplicationService implements ExecuteTransactionUseCase {
    constructor(
        @inject(LoadCustomerPortToken)
        private readonly loadCustomerPort: LoadCustomerPort,
        @inject(LoadAccountPortToken)
        private readonly loadAccountPort: LoadAccountPort
    ) {}

    async executeTransaction(command: ExecuteTransactionCommand): Promise<OperationResult> {
        const transaction = createTransaction(command.kind, command.money);

        const customer = await this.loadCustomerPort.findCustomerByNationalId(command.nationalId);
        if (!customer) {
            throw new CustomerNotFoundException(command.nationalId);
        }

        const account = await this.loadAccountPort.findAccountByNumber(command.accountNumber);
        if (!account) {
            throw new AccountNotFoundException(command.accountNumber);
        }

        const result = customer.execute(account, transaction);

        if (result.success) {
            console.log(
                `✅ ${transaction.kind} of ${transaction.amount.format()} applied to account ${command.accountNumber.toString()}`
            );
        } else {
            console.warn(
                `⚠️  ${transaction.kind} rejected on account ${command.accountNumber.toString()}: ${result.error.code}`
            );
        }

        return result;
    }
}
