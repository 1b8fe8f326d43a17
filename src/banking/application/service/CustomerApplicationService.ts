import {inject, injectable} from 'tsyringe';
import {CustomerNotFoundException} from '../domain/exception/CustomerNotFoundException';
import {DuplicateCustomerException} from '../domain/exception/DuplicateCustomerException';
import {Customer} from '../domain/model/Customer';
import type {NationalId} from '../domain/model/NationalId';
import type {CustomerQuery} from '../port/in/CustomerQuery';
import type {RegisterCustomerCommand} from '../port/in/RegisterCustomerCommand';
import type {RegisterCustomerUseCase} from '../port/in/RegisterCustomerUseCase';
import type {LoadCustomerPort} from '../port/out/LoadCustomerPort';
import {LoadCustomerPortToken} from '../port/out/LoadCustomerPort';
import type {SaveCustomerPort} from '../port/out/SaveCustomerPort';
import {SaveCustomerPortToken} from '../port/out/SaveCustomerPort';

/**
 * 顧客の登録と照会
 *
 * CPFの一意性はここで（登録前の検索で）保証する。
 * ドメインモデル自体は一意性を知らない
 */
@injectable()
export class CustomerApplicationService implements RegisterCustomerUseCase, CustomerQuery {
    constructor(
        @inject(LoadCustomerPortToken)
        private readonly loadCustomerPort: LoadCustomerPort,
        @inject(SaveCustomerPortToken)
        private readonly saveCustomerPort: SaveCustomerPort
    ) {}

    async registerCustomer(command: RegisterCustomerCommand): Promise<Customer> {
        const existing = await this.loadCustomerPort.findCustomerByNationalId(command.nationalId);
        if (existing) {
            throw new DuplicateCustomerException(command.nationalId);
        }

        const customer = Customer.individual({
            name: command.name.trim(),
            birthDate: command.birthDate,
            nationalId: command.nationalId,
            address: command.address.trim(),
        });

        await this.saveCustomerPort.saveCustomer(customer);
        console.log(`👤 Customer registered: ${command.nationalId.toString()}`);

        return customer;
    }

    async findCustomer(nationalId: NationalId): Promise<Customer> {
        const customer = await this.loadCustomerPort.findCustomerByNationalId(nationalId);
        if (!customer) {
            throw new CustomerNotFoundException(nationalId);
        }
        return customer;
    }

    listCustomers(): Promise<readonly Customer[]> {
        return this.loadCustomerPort.findAllCustomers();
    }
}
