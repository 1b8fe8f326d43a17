#!/usr/bin/env node
import 'reflect-metadata';
import {config} from 'dotenv';
import {container} from 'tsyringe';
import {BankingMenu} from './banking/adapter/in/cli/BankingMenu';
import {ConsoleIOToken, createReadlineConsole} from './banking/adapter/in/cli/ConsoleIO';
import {initializeApplication} from './config/app-initializer';

// .envファイルを読み込む（なければ環境変数とデフォルト値のみ）
config();

async function main(): Promise<void> {
    initializeApplication(process.env);

    container.register(ConsoleIOToken, {useValue: createReadlineConsole()});

    await container.resolve(BankingMenu).run();
}

main().catch((error: unknown) => {
    console.error('❌ Fatal error:', error);
    process.exitCode = 1;
});
