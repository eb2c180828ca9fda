#!/usr/bin/env node
// src/interface/cli/main.ts

import { Command } from 'commander';
import { CONFIG } from '../../config/config';
import { Logger } from '../../core/logging/Logger';
import { migrateCommand } from './migrate';

const program = new Command();

program
    .name(CONFIG.CLI.NAME)
    .description('Migrate an application from its shared database to a dedicated one')
    .version(CONFIG.CLI.VERSION, '-v, --version', 'Output the current version')
    .argument('<app>', 'Application to migrate')
    .option('--verbose', 'Log every step and request', false)
    .action(async (app: string, options: { verbose: boolean }) => {
        process.exitCode = await migrateCommand(app, options);
    });

program.parseAsync(process.argv).catch((error) => {
    Logger.error('cli', 'Unhandled failure', error);
    process.exitCode = 1;
});
