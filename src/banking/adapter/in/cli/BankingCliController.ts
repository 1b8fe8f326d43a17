import {inject, injectable} from 'tsyringe';
import {logOperation} from '../../../../common/logging/logOperation';
import {AccountNotFoundException} from '../../../application/domain/exception/AccountNotFoundException';
import type {Account} from '../../../application/domain/model/Account';
import type {Customer} from '../../../application/domain/model/Customer';
import type {TransactionKind} from '../../../application/domain/model/History';
import {Money} from '../../../application/domain/model/Money';
import {NationalId} from '../../../application/domain/model/NationalId';
import type {AccountQuery} from '../../../application/port/in/AccountQuery';
import {AccountQueryToken} from '../../../application/port/in/AccountQuery';
import type {CustomerQuery} from '../../../application/port/in/CustomerQuery';
import {CustomerQueryToken} from '../../../application/port/in/CustomerQuery';
import {ExecuteTransactionCommand} from '../../../application/port/in/ExecuteTransactionCommand';
import type {ExecuteTransactionUseCase} from '../../../application/port/in/ExecuteTransactionUseCase';
import {ExecuteTransactionUseCaseToken} from '../../../application/port/in/ExecuteTransactionUseCase';
import {OpenAccountCommand} from '../../../application/port/in/OpenAccountCommand';
import type {OpenAccountUseCase} from '../../../application/port/in/OpenAccountUseCase';
import {OpenAccountUseCaseToken} from '../../../application/port/in/OpenAccountUseCase';
import {RegisterCustomerCommand} from '../../../application/port/in/RegisterCustomerCommand';
import type {RegisterCustomerUseCase} from '../../../application/port/in/RegisterCustomerUseCase';
import {RegisterCustomerUseCaseToken} from '../../../application/port/in/RegisterCustomerUseCase';
import type {ConsoleIO} from './ConsoleIO';
import {ConsoleIOToken} from './ConsoleIO';
import {
    formatAccount,
    formatCustomer,
    formatStatement,
    toFailureMessage,
    toSuccessMessage,
} from './mappers/CliMapper';
import {
    accountChoiceSchema,
    AmountInputSchema,
    NationalIdInputSchema,
    StatementFilterInputSchema,
} from './models/CliInput';

/**
 * メニューの各操作を実行するCLIコントローラー
 *
 * 【責務】
 * - 入力を読み、形式をチェックしてコマンドに変換する
 * - ユースケースを呼び、結果を表示する
 *
 * 見つからない・重複などの例外はここでは捕まえず、メニュー（BankingMenu）に任せる
 */
@injectable()
export class BankingCliController {
    constructor(
        @inject(ConsoleIOToken)
        private readonly io: ConsoleIO,
        @inject(RegisterCustomerUseCaseToken)
        private readonly registerCustomerUseCase: RegisterCustomerUseCase,
        @inject(CustomerQueryToken)
        private readonly customerQuery: CustomerQuery,
        @inject(OpenAccountUseCaseToken)
        private readonly openAccountUseCase: OpenAccountUseCase,
        @inject(AccountQueryToken)
        private readonly accountQuery: AccountQuery,
        @inject(ExecuteTransactionUseCaseToken)
        private readonly executeTransactionUseCase: ExecuteTransactionUseCase
    ) {}

    @logOperation()
    async deposit(): Promise<void> {
        await this.moveMoney('Deposit', 'Deposit completed successfully!');
    }

    @logOperation()
    async withdraw(): Promise<void> {
        await this.moveMoney('Withdrawal', 'Withdrawal completed successfully!');
    }

    @logOperation('statement')
    async showStatement(): Promise<void> {
        const customer = await this.askCustomer();
        if (!customer) {
            return;
        }

        const account = await this.chooseAccount(customer);
        if (!account) {
            return;
        }

        const filter = StatementFilterInputSchema.safeParse(
            await this.io.ask('Filter by type (deposit/withdrawal, blank for all): ')
        );
        if (!filter.success) {
            this.io.print('\n@@@ Operation failed! Unknown transaction type. @@@');
            return;
        }

        const statement = await this.accountQuery.getStatement(
            customer.getNationalId(),
            account.getNumber(),
            filter.data === '' ? undefined : filter.data
        );

        this.io.print(formatStatement(statement));
    }

    @logOperation('new_customer')
    async registerCustomer(): Promise<void> {
        const nationalId = await this.askNationalId('Enter the CPF (numbers only): ');
        if (!nationalId) {
            return;
        }

        const name = await this.io.ask('Enter the full name: ');
        const birthDate = await this.io.ask('Enter the birth date (dd-mm-yyyy): ');
        const address = await this.io.ask(
            'Enter the address (street, number - district - city/state): '
        );

        await this.registerCustomerUseCase.registerCustomer(
            new RegisterCustomerCommand(nationalId, name, birthDate.trim(), address)
        );

        this.io.print(toSuccessMessage('Customer created successfully!'));
    }

    @logOperation('new_account')
    async openAccount(): Promise<void> {
        const nationalId = await this.askNationalId('Enter the customer CPF: ');
        if (!nationalId) {
            return;
        }

        const account = await this.openAccountUseCase.openAccount(new OpenAccountCommand(nationalId));

        this.io.print(
            toSuccessMessage(`Account ${account.getNumber().toString()} created successfully!`)
        );
    }

    @logOperation('list_accounts')
    async listAccounts(): Promise<void> {
        const accounts = await this.accountQuery.listAccounts();

        if (accounts.length === 0) {
            this.io.print('\nNo accounts registered.');
            return;
        }

        for (const account of accounts) {
            this.io.print('='.repeat(100));
            this.io.print(formatAccount(account));
        }
    }

    @logOperation('list_customers')
    async listCustomers(): Promise<void> {
        const customers = await this.customerQuery.listCustomers();

        this.io.print('\n========== Customer List ==========');
        for (const customer of customers) {
            this.io.print(formatCustomer(customer));
        }
        this.io.print('='.repeat(35));
    }

    private async moveMoney(kind: TransactionKind, successMessage: string): Promise<void> {
        const customer = await this.askCustomer();
        if (!customer) {
            return;
        }

        const money = await this.askAmount();
        if (!money) {
            return;
        }

        const account = await this.chooseAccount(customer);
        if (!account) {
            return;
        }

        const result = await this.executeTransactionUseCase.executeTransaction(
            new ExecuteTransactionCommand(kind, customer.getNationalId(), account.getNumber(), money)
        );

        this.io.print(result.success ? toSuccessMessage(successMessage) : toFailureMessage(result.error));
    }

    private async askNationalId(question: string): Promise<NationalId | null> {
        const input = NationalIdInputSchema.safeParse(await this.io.ask(question));

        if (!input.success) {
            this.io.print('\n@@@ Invalid CPF! It must contain exactly 11 digits. @@@');
            return null;
        }

        return NationalId.of(input.data);
    }

    /**
     * @throws CustomerNotFoundException
     */
    private async askCustomer(): Promise<Customer | null> {
        const nationalId = await this.askNationalId('Enter the customer CPF: ');
        if (!nationalId) {
            return null;
        }

        return this.customerQuery.findCustomer(nationalId);
    }

    private async askAmount(): Promise<Money | null> {
        const input = AmountInputSchema.safeParse(await this.io.ask('Enter the amount: '));

        if (!input.success) {
            this.io.print('\n@@@ Operation failed! The amount provided is invalid. @@@');
            return null;
        }

        return Money.parse(input.data);
    }

    /**
     * 口座が1つならそれを使い、複数あれば利用者に選ばせる
     *
     * @throws AccountNotFoundException 口座を1つも持っていない場合
     */
    private async chooseAccount(customer: Customer): Promise<Account | null> {
        const accounts = customer.getAccounts();

        if (accounts.length === 0) {
            throw new AccountNotFoundException(null);
        }

        if (accounts.length === 1) {
            return accounts[0];
        }

        this.io.print('\nChoose the account:');
        accounts.forEach((account, index) => {
            this.io.print(
                `${String(index)} - Branch: ${account.getBranchCode()}, Number: ${account.getNumber().toString()}`
            );
        });

        const choice = accountChoiceSchema(accounts.length).safeParse(
            await this.io.ask('Enter the account index: ')
        );
        if (!choice.success) {
            this.io.print('\n@@@ Operation failed! Invalid account selection. @@@');
            return null;
        }

        return accounts[choice.data];
    }
}
