import {inject, injectable} from 'tsyringe';
import {ClockToken} from '../../../config/types';
import {AccountNotFoundException} from '../domain/exception/AccountNotFoundException';
import {AccountNotOwnedException} from '../domain/exception/AccountNotOwnedException';
import {CustomerNotFoundException} from '../domain/exception/CustomerNotFoundException';
import {Account} from '../domain/model/Account';
import type {AccountNumber} from '../domain/model/AccountNumber';
import type {Clock} from '../domain/model/Clock';
import type {NationalId} from '../domain/model/NationalId';
import type {Statement} from '../domain/model/Statement';
import {statementOf} from '../domain/model/Statement';
import {AccountProperties, AccountPropertiesToken} from '../domain/service/AccountProperties';
import type {AccountQuery} from '../port/in/AccountQuery';
import type {OpenAccountCommand} from '../port/in/OpenAccountCommand';
import type {OpenAccountUseCase} from '../port/in/OpenAccountUseCase';
import type {LoadAccountPort} from '../port/out/LoadAccountPort';
import {LoadAccountPortToken} from '../port/out/LoadAccountPort';
import type {LoadCustomerPort} from '../port/out/LoadCustomerPort';
import {LoadCustomerPortToken} from '../port/out/LoadCustomerPort';
import type {SaveAccountPort} from '../port/out/SaveAccountPort';
import {SaveAccountPortToken} from '../port/out/SaveAccountPort';

/**
 * 口座の開設と照会
 */
@injectable()
export class AccountApplicationService implements OpenAccountUseCase, AccountQuery {
    constructor(
        @inject(LoadCustomerPortToken)
        private readonly loadCustomerPort: LoadCustomerPort,
        @inject(LoadAccountPortToken)
        private readonly loadAccountPort: LoadAccountPort,
        @inject(SaveAccountPortToken)
        private readonly saveAccountPort: SaveAccountPort,
        @inject(AccountPropertiesToken)
        private readonly accountProperties: AccountProperties,
        @inject(ClockToken)
        private readonly clock: Clock
    ) {}

    /**
     * 当座預金口座を開設し、顧客と台帳の両方に登録する
     */
    async openAccount(command: OpenAccountCommand): Promise<Account> {
        const customer = await this.loadCustomerPort.findCustomerByNationalId(command.nationalId);
        if (!customer) {
            throw new CustomerNotFoundException(command.nationalId);
        }

        const accountNumber = await this.saveAccountPort.nextAccountNumber();
        const account = Account.openChecking(
            customer,
            accountNumber,
            this.accountProperties.checkingPolicy(),
            {
                branchCode: this.accountProperties.branchCode,
                clock: this.clock,
            }
        );

        // 台帳に保存できた口座だけを顧客に紐付ける
        await this.saveAccountPort.saveAccount(account);
        customer.addAccount(account);

        console.log(
            `🏦 Account opened: ${account.getBranchCode()}/${accountNumber.toString()} for ${command.nationalId.toString()}`
        );

        return account;
    }

    listAccounts(): Promise<readonly Account[]> {
        return this.loadAccountPort.findAllAccounts();
    }

    async getStatement(
        nationalId: NationalId,
        accountNumber: AccountNumber,
        filterKind?: string
    ): Promise<Statement> {
        const customer = await this.loadCustomerPort.findCustomerByNationalId(nationalId);
        if (!customer) {
            throw new CustomerNotFoundException(nationalId);
        }

        const account = await this.loadAccountPort.findAccountByNumber(accountNumber);
        if (!account) {
            throw new AccountNotFoundException(accountNumber);
        }

        if (!customer.owns(account)) {
            throw new AccountNotOwnedException(accountNumber, nationalId);
        }

        return statementOf(account, filterKind);
    }
}
