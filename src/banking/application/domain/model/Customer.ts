import {AccountNotOwnedException} from '../exception/AccountNotOwnedException';
import type {Account} from './Account';
import type {NationalId} from './NationalId';
import type {OperationResult} from './OperationResult';
import {failed} from './OperationResult';
import type {Transaction} from './Transaction';

/**
 * 個人顧客の本人情報
 */
export interface IndividualIdentity {
    readonly kind: 'individual';
    readonly name: string;
    /** dd-mm-yyyy */
    readonly birthDate: string;
    readonly nationalId: NationalId;
}

/**
 * 顧客の本人情報（種別ごとのタグ付きユニオン）
 */
export type CustomerIdentity = IndividualIdentity;

/**
 * 銀行の顧客
 *
 * 複数の口座を持つことができ、取引の実行主体になる
 */
export class Customer {
    private readonly accounts: Account[] = [];

    private constructor(
        private readonly identity: CustomerIdentity,
        private readonly address: string
    ) {}

    static individual(params: {
        name: string;
        birthDate: string;
        nationalId: NationalId;
        address: string;
    }): Customer {
        return new Customer(
            {
                kind: 'individual',
                name: params.name,
                birthDate: params.birthDate,
                nationalId: params.nationalId,
            },
            params.address
        );
    }

    getIdentity(): CustomerIdentity {
        return this.identity;
    }

    getName(): string {
        return this.identity.name;
    }

    getNationalId(): NationalId {
        return this.identity.nationalId;
    }

    getAddress(): string {
        return this.address;
    }

    getAccounts(): readonly Account[] {
        return [...this.accounts];
    }

    addAccount(account: Account): void {
        this.accounts.push(account);
    }

    owns(account: Account): boolean {
        return account.getCustomer() === this;
    }

    /**
     * 口座に対して取引を実行する
     *
     * 自分の口座以外に対する取引は適用せずに失敗を返す
     */
    execute(account: Account, transaction: Transaction): OperationResult {
        if (!this.owns(account)) {
            return failed(
                new AccountNotOwnedException(account.getNumber(), this.getNationalId())
            );
        }

        return transaction.apply(account);
    }
}
