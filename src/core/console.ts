import chalk from 'chalk';

/**
 * Pretty console output for user-facing messages
 * Separate from structured JSON logs
 */

const icons = {
    info: 'ℹ',
    success: '✓',
    warning: '⚠',
    error: '✗',
    step: '▸',
    package: '📦',
    git: '📝',
};

export const console_log = {
    header: (text: string) => {
        console.log('\n' + chalk.bold.magenta('═'.repeat(60)));
        console.log(chalk.bold.magenta(`  ${text}`));
        console.log(chalk.bold.magenta('═'.repeat(60)) + '\n');
    },

    section: (text: string) => {
        console.log('\n' + chalk.bold.cyan(`${icons.step} ${text}`));
    },

    info: (text: string, detail?: string) => {
        console.log(chalk.blue(`  ${icons.info}  ${text}`) + (detail ? chalk.gray(` ${detail}`) : ''));
    },

    success: (text: string, detail?: string) => {
        console.log(chalk.green(`  ${icons.success}  ${text}`) + (detail ? chalk.gray(` ${detail}`) : ''));
    },

    warning: (text: string, detail?: string) => {
        console.log(chalk.yellow(`  ${icons.warning}  ${text}`) + (detail ? chalk.gray(` ${detail}`) : ''));
    },

    error: (text: string, detail?: string) => {
        console.log(chalk.red(`  ${icons.error}  ${text}`) + (detail ? chalk.gray(` ${detail}`) : ''));
    },

    package: (text: string, detail?: string) => {
        console.log(chalk.cyan(`  ${icons.package}  ${text}`) + (detail ? chalk.gray(` ${detail}`) : ''));
    },

    git: (text: string, detail?: string) => {
        console.log(chalk.green(`  ${icons.git}  ${text}`) + (detail ? chalk.gray(` ${detail}`) : ''));
    },

    check: (passed: boolean, text: string) => {
        console.log(passed ? chalk.green(`     ${icons.success} ${text}`) : chalk.red(`     ${icons.error} ${text}`));
    },

    dim: (text: string) => {
        console.log(chalk.gray(`     ${text}`));
    },

    divider: () => {
        console.log(chalk.gray('  ' + '─'.repeat(56)));
    }
};
