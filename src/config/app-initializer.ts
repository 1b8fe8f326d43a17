import type {EnvBindings} from '../types/bindings'
import {setupContainer, resetContainer} from './container'
import {loadConfig} from './env'

/**
 * アプリケーション全体の初期化
 *
 * 【責務】
 * 1. 環境変数の検証（loadConfig）
 * 2. DIコンテナの設定（setupContainer）
 */

let isInitialized = false

export function initializeApplication(env: EnvBindings): void {
    if (isInitialized) {
        return
    }

    console.log('🚀 Initializing application...')

    setupContainer(loadConfig(env))

    isInitialized = true
    console.log('✅ Application initialized')
}

export function resetApplication(): void {
    resetContainer()
    isInitialized = false
    console.log('🔄 Application reset')
}
