/**
 * Logger utility
 * Chalk-based colored console output
 */

import chalk from 'chalk';

export const log = {
    info: (msg: string) => console.log(chalk.blue('ℹ'), msg),
    success: (msg: string) => console.log(chalk.green('✔'), msg),
    warn: (msg: string) => console.log(chalk.yellow('⚠'), msg),
    error: (msg: string) => console.error(chalk.red('✖'), msg),
    dim: (msg: string) => console.log(chalk.dim(msg)),
    bold: (msg: string) => console.log(chalk.bold(msg)),
    debug: (msg: string) => console.log(`${chalk.dim('DEBUG')} ${chalk.dim(msg)}`),

    // Section header
    header: (title: string) => {
        console.log();
        console.log(chalk.bold.underline(title));
        console.log();
    },

    // Key-value pair
    kv: (key: string, value: string | number | boolean) => {
        console.log(`  ${chalk.dim(key + ':')} ${value}`);
    },
};
