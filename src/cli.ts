#!/usr/bin/env node
import { Command } from 'commander';
import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import chalk from 'chalk';
import { ZodError } from 'zod';

import { loadConfig, type VolprovConfig } from './core/config.js';
import { errorMessage } from './core/errors.js';
import { EXIT_CODES, provision } from './provision/install.js';

const BANNER = `
 ▌ ▌   ▜
 ▚▗▘▞▀▖▐ ▛▀▖▙▀▖▞▀▖▌ ▌
 ▝▞ ▌ ▌▐ ▙▄▘▌  ▌ ▌▐▐
  ▘ ▝▀  ▘▌  ▘  ▝▀  ▘
`;

async function askConfirmation(): Promise<boolean> {
    if (!input.isTTY) {
        console.error(chalk.yellow('stdin is not a terminal; pass --yes to run without the prompt.'));
        return false;
    }
    const rl = readline.createInterface({ input, output });
    try {
        const answer = (await rl.question(chalk.yellow('\nContinue with installation? [Y/n] '))).trim().toLowerCase();
        return answer === '' || answer === 'y' || answer === 'yes';
    } catch (e) {
        // Ctrl+C or Ctrl+D at the prompt rejects the question
        console.error(chalk.yellow(`\nNo answer (${errorMessage(e)}); treating it as no.`));
        return false;
    } finally {
        rl.close();
    }
}

function printConfigError(e: unknown): void {
    if (e instanceof ZodError) {
        console.error(chalk.red('Invalid configuration:'));
        for (const issue of e.issues) {
            console.error(chalk.red(`  ${issue.path.join('.') || '(root)'}: ${issue.message}`));
        }
        return;
    }
    console.error(chalk.red(`Invalid configuration: ${errorMessage(e)}`));
}

interface CliOptions {
    yes: boolean;
    config?: string;
    logDir?: string;
    binDir?: string;
    failFast: boolean;
    strictVerify: boolean;
    maxTime?: string;
}

const program = new Command();

program
    .name('volprov')
    .description('Install Volatility 2.6.1 under a pinned Python 2 interpreter. Do not run two installs at once: there is no locking.')
    .version('0.1.0')
    .option('-y, --yes', 'Skip the confirmation prompt', false)
    .option('--config <file>', 'JSON file overriding the install target and settings')
    .option('--log-dir <dir>', 'Directory for logs and the run report')
    .option('--bin-dir <dir>', 'Directory for the wrapper and its aliases')
    .option('--no-fail-fast', 'Keep running after a fatal step fails')
    .option('--strict-verify', 'Abort when a critical smoke test fails', false)
    .option('--max-time <seconds>', 'Stop before the next step once this many seconds have passed')
    .action(async (options: CliOptions) => {
        let config: VolprovConfig;
        try {
            config = loadConfig(process.env, {
                configFile: options.config,
                logDir: options.logDir,
                binDir: options.binDir,
                nonInteractive: options.yes ? true : undefined,
                failFast: options.failFast ? undefined : false,
                strictVerification: options.strictVerify ? true : undefined,
                maxRunSeconds: options.maxTime ? parseInt(options.maxTime, 10) : undefined,
            });
        } catch (e) {
            printConfigError(e);
            process.exitCode = EXIT_CODES.aborted;
            return;
        }

        console.log(chalk.cyan(BANNER));
        console.log(chalk.gray(`${config.target.displayName} for systems where python is Python 3`));

        const controller = new AbortController();
        let interrupts = 0;
        const onSignal = (signal: NodeJS.Signals) => {
            interrupts += 1;
            if (interrupts > 1) {
                process.exit(EXIT_CODES.interrupted);
            }
            console.error(chalk.yellow(`\n${signal} received: stopping after the current step (repeat to force)`));
            controller.abort(new Error(signal));
        };
        process.on('SIGINT', onSignal);
        process.on('SIGTERM', onSignal);

        try {
            const result = await provision({
                config,
                isPrivileged: () => process.geteuid?.() === 0,
                confirm: askConfirmation,
                signal: controller.signal,
            });
            process.exitCode = result.exitCode;
        } finally {
            process.off('SIGINT', onSignal);
            process.off('SIGTERM', onSignal);
        }
    });

program.parseAsync(process.argv).catch((e: unknown) => {
    console.error(chalk.red(`volprov: ${errorMessage(e)}`));
    process.exitCode = EXIT_CODES.aborted;
});
