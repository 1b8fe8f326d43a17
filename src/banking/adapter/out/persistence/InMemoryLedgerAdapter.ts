import {injectable} from 'tsyringe';
import type {Account} from '../../../application/domain/model/Account';
import {AccountNumber} from '../../../application/domain/model/AccountNumber';
import type {Customer} from '../../../application/domain/model/Customer';
import type {NationalId} from '../../../application/domain/model/NationalId';
import type {LoadAccountPort} from '../../../application/port/out/LoadAccountPort';
import type {LoadCustomerPort} from '../../../application/port/out/LoadCustomerPort';
import type {SaveAccountPort} from '../../../application/port/out/SaveAccountPort';
import type {SaveCustomerPort} from '../../../application/port/out/SaveCustomerPort';

/**
 * インメモリの台帳
 *
 * 【用途】
 * - 1プロセス（1セッション）の間、顧客と口座を保持する
 * - DIコンテナにシングルトンとして登録され、各サービスに注入される
 *
 * 【特徴】
 * - プロセス終了でデータは消える
 * - 顧客は CPF、口座は口座番号をキーに保持する
 * - Map は挿入順を保持するので、一覧は登録順になる
 *
 * InMemory実装では非同期処理が不要なため、asyncを使用せず
 * Promise.resolve()で即座に解決されるPromiseを返す。
 */
@injectable()
export class InMemoryLedgerAdapter
    implements LoadCustomerPort, SaveCustomerPort, LoadAccountPort, SaveAccountPort
{
    private readonly customers = new Map<string, Customer>();
    private readonly accounts = new Map<number, Account>();
    private lastAccountNumber: AccountNumber | null = null;

    findCustomerByNationalId(nationalId: NationalId): Promise<Customer | null> {
        return Promise.resolve(this.customers.get(nationalId.getValue()) ?? null);
    }

    findAllCustomers(): Promise<readonly Customer[]> {
        return Promise.resolve([...this.customers.values()]);
    }

    saveCustomer(customer: Customer): Promise<void> {
        this.customers.set(customer.getNationalId().getValue(), customer);
        return Promise.resolve();
    }

    findAccountByNumber(accountNumber: AccountNumber): Promise<Account | null> {
        return Promise.resolve(this.accounts.get(accountNumber.getValue()) ?? null);
    }

    findAllAccounts(): Promise<readonly Account[]> {
        return Promise.resolve([...this.accounts.values()]);
    }

    /**
     * 口座番号を払い出す
     *
     * 払い出した番号は saveAccount されなくても再利用しない
     */
    nextAccountNumber(): Promise<AccountNumber> {
        this.lastAccountNumber = this.lastAccountNumber?.next() ?? new AccountNumber(1);
        return Promise.resolve(this.lastAccountNumber);
    }

    saveAccount(account: Account): Promise<void> {
        const key = account.getNumber().getValue();

        if (this.accounts.has(key) && this.accounts.get(key) !== account) {
            return Promise.reject(
                new Error(`Account number already in use: ${account.getNumber().toString()}`)
            );
        }

        this.accounts.set(key, account);
        return Promise.resolve();
    }
}
