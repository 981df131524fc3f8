#!/usr/bin/env node
/**
 * Allocation Connect CLI
 * alc — credentials and authenticated requests for the allocation reporting API
 */

import { Command } from 'commander';
import { createConfigCommand } from './commands/config.js';
import { createAuthCommand } from './commands/auth.js';
import { createRequestCommand } from './commands/request.js';
import { setVerbose } from './commands/shared.js';
import { VERSION } from './version.js';

const program = new Command();

program
    .name('alc')
    .description('Allocation Connect — credential manager for the allocation reporting API')
    .version(VERSION)
    .option('--verbose', 'Print every credential event')
    .hook('preAction', (thisCommand) => {
        setVerbose(thisCommand.opts().verbose === true);
    });

program.addCommand(createConfigCommand());
program.addCommand(createAuthCommand());
program.addCommand(createRequestCommand());

program.parse();
