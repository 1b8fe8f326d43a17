/**
 * 操作ログのデコレーター
 *
 * メソッドの実行が終わった時点（成功・失敗どちらでも）で
 * 「<ISO時刻>: <操作名>」を出力する
 *
 * @example
 * ```typescript
 * class BankingCliController {
 *     @logOperation('deposit')
 *     async deposit(): Promise<void> { ... }
 * }
 * // => 2026-10-19T12:00:00.000Z: DEPOSIT
 * ```
 *
 * @param operationName 省略時はメソッド名
 */
export function logOperation(operationName?: string) {
    return function (
        _target: object,
        propertyKey: string | symbol,
        descriptor: TypedPropertyDescriptor<() => Promise<void>>
    ): void {
        const original = descriptor.value
        if (!original) {
            return
        }

        const label = (operationName ?? String(propertyKey)).toUpperCase()

        descriptor.value = async function (this: unknown): Promise<void> {
            try {
                await original.call(this)
            } finally {
                console.log(`${new Date().toISOString()}: ${label}`)
            }
        }
    }
}
