import * as readline from 'readline'

/**
 * CLIの入出力
 * 本番は readline、テストでは台本どおりに答えるスタブを使う
 */
export interface ConsoleIO {
    /**
     * 質問を表示して1行読み込む
     *
     * @throws InputClosedError 入力が閉じられた場合（Ctrl+D など）
     */
    ask(question: string): Promise<string>

    print(text: string): void

    close(): void
}

export const ConsoleIOToken = Symbol('ConsoleIO')

export class InputClosedError extends Error {
    constructor() {
        super('Input stream closed')
        this.name = 'InputClosedError'
    }
}

/**
 * 標準入出力を使う ConsoleIO
 */
export function createReadlineConsole(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout
): ConsoleIO {
    const rl = readline.createInterface({input, output})
    let closed = false
    const pending = new Set<(error: InputClosedError) => void>()

    rl.on('close', () => {
        closed = true
        for (const reject of pending) {
            reject(new InputClosedError())
        }
        pending.clear()
    })

    return {
        ask(question: string): Promise<string> {
            if (closed) {
                return Promise.reject(new InputClosedError())
            }

            return new Promise((resolve, reject) => {
                pending.add(reject)
                rl.question(question, (answer) => {
                    pending.delete(reject)
                    resolve(answer)
                })
            })
        },

        print(text: string): void {
            output.write(`${text}\n`)
        },

        close(): void {
            rl.close()
        },
    }
}
