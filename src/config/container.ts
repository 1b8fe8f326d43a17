/**
 * DIコンテナ設定ファイル
 *
 * 【tsyringe の基本用語】
 * - Token: 依存オブジェクトを識別するためのキー（通常はSymbol）
 * - register: コンテナに「このTokenならこのクラス/値を使う」というルールを登録
 * - resolve: Tokenを指定して、対応するインスタンスを取得
 * - inject: クラスのコンストラクタで、どの依存が必要かを宣言
 *
 * アプリケーション層はポート（インターフェース）にしか依存しない。
 * 台帳の実体（InMemoryLedgerAdapter）をどのポートに割り当てるかはここで決める。
 */

import 'reflect-metadata'; // tsyringe が必要とするメタデータ機能を有効化
import {container} from 'tsyringe';
import {InMemoryLedgerAdapter} from '../banking/adapter/out/persistence/InMemoryLedgerAdapter';
import type {Clock} from '../banking/application/domain/model/Clock';
import {systemClock} from '../banking/application/domain/model/Clock';
import {
    AccountProperties,
    AccountPropertiesToken
} from '../banking/application/domain/service/AccountProperties';
import {AccountQueryToken} from '../banking/application/port/in/AccountQuery';
import {CustomerQueryToken} from '../banking/application/port/in/CustomerQuery';
import {ExecuteTransactionUseCaseToken} from '../banking/application/port/in/ExecuteTransactionUseCase';
import {OpenAccountUseCaseToken} from '../banking/application/port/in/OpenAccountUseCase';
import {RegisterCustomerUseCaseToken} from '../banking/application/port/in/RegisterCustomerUseCase';
import {LoadAccountPortToken} from '../banking/application/port/out/LoadAccountPort';
import {LoadCustomerPortToken} from '../banking/application/port/out/LoadCustomerPort';
import {SaveAccountPortToken} from '../banking/application/port/out/SaveAccountPort';
import {SaveCustomerPortToken} from '../banking/application/port/out/SaveCustomerPort';
import {AccountApplicationService} from '../banking/application/service/AccountApplicationService';
import {CustomerApplicationService} from '../banking/application/service/CustomerApplicationService';
import {TransactionApplicationService} from '../banking/application/service/TransactionApplicationService';
import type {AppConfig} from './types';
import {ClockToken} from './types';

// 初期化済みフラグ（複数回初期化を防ぐ）
let isInitialized = false;

/**
 * DIコンテナの初期化と依存関係の登録
 *
 * 【処理の流れ】
 * 1. 設定値と時計の登録
 * 2. 台帳（出力アダプター）の登録
 * 3. アプリケーションサービス（UseCase実装）の登録
 *
 * @param config 環境変数から組み立てた設定
 * @param clock 現在時刻の取得方法（テストでは固定時刻を渡す）
 */
export function setupContainer(config: AppConfig, clock: Clock = systemClock): void {
    if (isInitialized) {
        return;
    }

    console.log('🚀 Initializing DI container...');

    // ========================================
    // 1. 設定値と時計
    // ========================================
    container.register(AccountPropertiesToken, {
        useValue: new AccountProperties(
            config.branchCode,
            config.checkingWithdrawalLimit,
            config.checkingMaxWithdrawals
        ),
    });
    container.register(ClockToken, {useValue: clock});

    // ========================================
    // 2. 台帳（出力アダプター）
    // ========================================

    /**
     * 1つの台帳インスタンスが4つのポートをすべて実装する。
     * useToken で同じシングルトンを使い回すので、
     * 顧客と口座は必ず同じ台帳に保存される。
     */
    container.registerSingleton(InMemoryLedgerAdapter, InMemoryLedgerAdapter);
    container.register(LoadCustomerPortToken, {useToken: InMemoryLedgerAdapter});
    container.register(SaveCustomerPortToken, {useToken: InMemoryLedgerAdapter});
    container.register(LoadAccountPortToken, {useToken: InMemoryLedgerAdapter});
    container.register(SaveAccountPortToken, {useToken: InMemoryLedgerAdapter});

    // ========================================
    // 3. アプリケーションサービス
    // ========================================
    container.registerSingleton(CustomerApplicationService, CustomerApplicationService);
    container.registerSingleton(AccountApplicationService, AccountApplicationService);

    container.register(RegisterCustomerUseCaseToken, {useToken: CustomerApplicationService});
    container.register(CustomerQueryToken, {useToken: CustomerApplicationService});
    container.register(OpenAccountUseCaseToken, {useToken: AccountApplicationService});
    container.register(AccountQueryToken, {useToken: AccountApplicationService});
    container.register(ExecuteTransactionUseCaseToken, {
        useClass: TransactionApplicationService,
    });

    isInitialized = true;
    console.log(
        `✅ DI container initialized (branch ${config.branchCode}, ` +
        `limit ${config.checkingWithdrawalLimit.format()}, ` +
        `max withdrawals ${String(config.checkingMaxWithdrawals)})`
    );
}

/**
 * コンテナをリセット（主にテスト用）
 *
 * clearInstances でシングルトン（台帳）も破棄されるので、
 * 次の setupContainer で空の台帳から始まる
 */
export function resetContainer(): void {
    container.clearInstances();
    isInitialized = false;
    console.log('🔄 DI container reset');
}

export {container};
