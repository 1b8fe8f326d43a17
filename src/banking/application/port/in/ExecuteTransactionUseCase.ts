import type {OperationResult} from '../../domain/model/OperationResult';
import type {ExecuteTransactionCommand} from './ExecuteTransactionCommand';

/**
 * 入出金ユースケース（入力ポート）
 *
 * 口座のルールによる失敗（残高不足など）は例外ではなく結果として返る。
 * 顧客・口座が見つからない場合と金額が不正な場合は例外になる
 */
export interface ExecuteTransactionUseCase {
    /**
     * @throws CustomerNotFoundException
     * @throws AccountNotFoundException
     * @throws InvalidAmountException
     */
    executeTransaction(command: ExecuteTransactionCommand): Promise<OperationResult>;
}

export const ExecuteTransactionUseCaseToken = Symbol('ExecuteTransactionUseCase');
