import {inject, injectable} from 'tsyringe';
import {BankingException} from '../../../application/domain/exception/BankingException';
import {BankingCliController} from './BankingCliController';
import type {ConsoleIO} from './ConsoleIO';
import {ConsoleIOToken, InputClosedError} from './ConsoleIO';
import {toFailureMessage} from './mappers/CliMapper';

const MENU = `
================ MENU ================
[d]\tDeposit
[s]\tWithdraw
[e]\tStatement
[nc]\tNew account
[lc]\tList accounts
[nu]\tNew customer
[lu]\tList customers
[q]\tQuit
=> `;

/**
 * 対話メニューのループ
 *
 * 1回に1つの操作を最後まで実行してから次の入力を受け付ける。
 * どの操作が失敗してもメッセージを表示してメニューに戻る
 */
@injectable()
export class BankingMenu {
    private readonly actions: ReadonlyMap<string, () => Promise<void>>;

    constructor(
        @inject(ConsoleIOToken)
        private readonly io: ConsoleIO,
        @inject(BankingCliController)
        controller: BankingCliController
    ) {
        this.actions = new Map([
            ['d', () => controller.deposit()],
            ['s', () => controller.withdraw()],
            ['e', () => controller.showStatement()],
            ['nc', () => controller.openAccount()],
            ['lc', () => controller.listAccounts()],
            ['nu', () => controller.registerCustomer()],
            ['lu', () => controller.listCustomers()],
        ]);
    }

    /**
     * q が入力されるか、入力が閉じられるまで繰り返す
     */
    async run(): Promise<void> {
        this.io.print('\nWelcome! Please select one of the options below.');

        for (;;) {
            let option: string;
            try {
                option = (await this.io.ask(MENU)).trim();
            } catch (error) {
                if (error instanceof InputClosedError) {
                    break;
                }
                throw error;
            }

            if (option === 'q') {
                this.io.print('\nThank you for banking with us, see you soon!');
                break;
            }

            const action = this.actions.get(option);
            if (!action) {
                this.io.print('\n@@@ Invalid operation, please select the desired operation again. @@@');
                continue;
            }

            const finished = await this.dispatch(action);
            if (!finished) {
                break;
            }
        }

        this.io.close();
    }

    /**
     * @returns 入力が閉じられた場合は false
     */
    private async dispatch(action: () => Promise<void>): Promise<boolean> {
        try {
            await action();
        } catch (error) {
            if (error instanceof InputClosedError) {
                return false;
            }

            if (error instanceof BankingException) {
                this.io.print(toFailureMessage(error));
            } else {
                // 予期しないエラー（バグ等）
                console.error('❌ Unexpected error:', error);
                this.io.print('\n@@@ Operation failed! An unexpected error occurred. @@@');
            }
        }

        return true;
    }
}
