import {AccountNotFoundException} from '../../../../application/domain/exception/AccountNotFoundException';
import type {BankingException} from '../../../../application/domain/exception/BankingException';
import {InvalidCommandException} from '../../../../application/domain/exception/InvalidCommandException';
import {WithdrawalCountExceededException} from '../../../../application/domain/exception/WithdrawalCountExceededException';
import type {Account} from '../../../../application/domain/model/Account';
import type {Customer} from '../../../../application/domain/model/Customer';
import type {Statement} from '../../../../application/domain/model/Statement';

/**
 * ドメインの値をCLIの表示文字列に変換するマッパー
 */

const FAILURE_MESSAGES: Record<BankingException['code'], string> = {
    INVALID_AMOUNT: 'The amount provided is invalid.',
    INSUFFICIENT_FUNDS: 'You do not have sufficient balance.',
    LIMIT_EXCEEDED: 'The withdrawal amount exceeds the limit.',
    WITHDRAWAL_COUNT_EXCEEDED: 'Maximum number of withdrawals exceeded.',
    CUSTOMER_NOT_FOUND: 'Customer not found!',
    ACCOUNT_NOT_FOUND: 'Account not found!',
    ACCOUNT_NOT_OWNED: 'The account does not belong to this customer.',
    DUPLICATE_CUSTOMER: 'A customer with this CPF already exists!',
    INVALID_NATIONAL_ID: 'Invalid CPF! It must contain exactly 11 digits.',
    INVALID_COMMAND: 'Invalid data.',
};

export function toFailureMessage(error: BankingException): string {
    let message = FAILURE_MESSAGES[error.code];

    if (error instanceof WithdrawalCountExceededException) {
        message = `Maximum number of withdrawals (${String(error.maxWithdrawals)}) exceeded.`;
    } else if (error instanceof AccountNotFoundException && !error.accountNumber) {
        message = 'Customer has no account!';
    } else if (error instanceof InvalidCommandException) {
        message = `Invalid data: ${error.issues.join(', ')}.`;
    }

    return `\n@@@ Operation failed! ${message} @@@`;
}

export function toSuccessMessage(message: string): string {
    return `\n=== ${message} ===`;
}

/**
 * dd-mm-yyyy HH:MM:SS
 */
export function formatTimestamp(date: Date): string {
    const pad = (value: number): string => value.toString().padStart(2, '0');

    return (
        `${pad(date.getDate())}-${pad(date.getMonth() + 1)}-${String(date.getFullYear())} ` +
        `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
    );
}

export function formatStatement(statement: Statement): string {
    const lines = [
        '\n================ STATEMENT ================',
        `Branch:\t\t${statement.branchCode}`,
        `Account:\t${statement.accountNumber.toString()}`,
        `Holder:\t\t${statement.holderName}`,
        '',
    ];

    if (statement.entries.length === 0) {
        lines.push('No transactions were made.');
    }

    for (const entry of statement.entries) {
        lines.push(`${formatTimestamp(entry.timestamp)}\t${entry.kind}:\t${entry.amount.format()}`);
    }

    lines.push('', `Balance:\t${statement.balance.format()}`);
    lines.push('===========================================');

    return lines.join('\n');
}

export function formatAccount(account: Account): string {
    return [
        `Branch:\t\t${account.getBranchCode()}`,
        `Number:\t\t${account.getNumber().toString()}`,
        `Holder:\t\t${account.getCustomer().getName()}`,
        `Balance:\t${account.getBalance().format()}`,
    ].join('\n');
}

export function formatCustomer(customer: Customer): string {
    return `Name: ${customer.getName()}, CPF: ${customer.getNationalId().toString()}, Address: ${customer.getAddress()}`;
}
