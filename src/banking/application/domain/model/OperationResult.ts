import type {AccountNotOwnedException} from '../exception/AccountNotOwnedException';
import type {InsufficientFundsException} from '../exception/InsufficientFundsException';
import type {InvalidAmountException} from '../exception/InvalidAmountException';
import type {LimitExceededException} from '../exception/LimitExceededException';
import type {WithdrawalCountExceededException} from '../exception/WithdrawalCountExceededException';
import type {Money} from './Money';

/**
 * 入出金が失敗した理由
 */
export type OperationError =
    | InvalidAmountException
    | InsufficientFundsException
    | LimitExceededException
    | WithdrawalCountExceededException
    | AccountNotOwnedException;

/**
 * 入出金の結果
 *
 * 失敗は throw せずに error として返す。
 * success で絞り込めば balance / error に型安全にアクセスできる
 */
export type OperationResult =
    | { readonly success: true; readonly balance: Money }
    | { readonly success: false; readonly error: OperationError };

export function succeeded(balance: Money): OperationResult {
    return {success: true, balance};
}

export function failed(error: OperationError): OperationResult {
    return {success: false, error};
}
