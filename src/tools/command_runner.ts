import { execa } from 'execa';
import path from 'node:path';
import { promises as fs, constants as fsConstants } from 'node:fs';
import { ProvisionError, errorMessage, type ErrorKind } from '../core/errors.js';

export type CommandErrorKind = Extract<ErrorKind, 'NotFound' | 'Timeout' | 'NonZeroExit'>;

export interface CommandResult {
    command: string;
    args: string[];
    exitCode: number;
    stdout: string;
    stderr: string;
    timedOut: boolean;
    startTime: number;
    endTime: number;
    durationMs: number;
    /** Absent when the command exited 0. */
    errorKind?: CommandErrorKind;
}

export interface RunCommandOptions {
    cwd?: string;
    timeoutMs?: number;
    env?: NodeJS.ProcessEnv;
    input?: string;
}

/**
 * Seam between the provisioning steps and the operating system.
 * Tests swap in an in-process fake.
 */
export interface CommandExecutor {
    run(command: string, args?: string[], options?: RunCommandOptions): Promise<CommandResult>;
    /** True when `name` resolves to an executable (the `command -v` check). */
    exists(name: string): Promise<boolean>;
}

const DEFAULT_TIMEOUT_MS = 600_000;
const NOT_FOUND_EXIT_CODE = 127;

/**
 * Runs an executable with an argv array (no shell), capturing stdout and stderr.
 * Never throws for a non-zero exit; inspect `exitCode` and `errorKind`.
 */
export async function runCommand(
    command: string,
    args: string[] = [],
    options: RunCommandOptions = {}
): Promise<CommandResult> {
    const startTime = Date.now();
    const finish = (partial: Omit<CommandResult, 'command' | 'args' | 'startTime' | 'endTime' | 'durationMs'>): CommandResult => {
        const endTime = Date.now();
        return { command, args, ...partial, startTime, endTime, durationMs: endTime - startTime };
    };

    try {
        const result = await execa(command, args, {
            cwd: options.cwd,
            env: options.env,
            timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
            input: options.input,
            reject: false, // Don't throw on non-zero exit code
        });

        const spawnCode = result instanceof Error && 'code' in result ? result.code : undefined;
        if (spawnCode === 'ENOENT') {
            return finish({
                exitCode: NOT_FOUND_EXIT_CODE,
                stdout: '',
                stderr: `${command}: command not found`,
                timedOut: false,
                errorKind: 'NotFound',
            });
        }

        const exitCode = typeof result.exitCode === 'number' ? result.exitCode : -1;
        let errorKind: CommandErrorKind | undefined;
        if (result.timedOut) {
            errorKind = 'Timeout';
        } else if (exitCode !== 0) {
            errorKind = 'NonZeroExit';
        }

        return finish({
            exitCode,
            stdout: result.stdout ?? '',
            stderr: result.stderr ?? '',
            timedOut: result.timedOut,
            errorKind,
        });
    } catch (e) {
        // Only reached for invalid spawn options, never for a non-zero exit
        return finish({
            exitCode: -1,
            stdout: '',
            stderr: errorMessage(e),
            timedOut: false,
            errorKind: 'NonZeroExit',
        });
    }
}

async function isExecutable(filePath: string): Promise<boolean> {
    try {
        const stats = await fs.stat(filePath);
        if (!stats.isFile()) return false;
        await fs.access(filePath, fsConstants.X_OK);
        return true;
    } catch {
        return false;
    }
}

/**
 * Resolves `name` against PATH the way `command -v` does.
 */
export async function commandExists(name: string, env: NodeJS.ProcessEnv = process.env): Promise<boolean> {
    if (name.includes('/')) {
        return isExecutable(name);
    }
    const dirs = (env.PATH ?? '').split(path.delimiter).filter(Boolean);
    for (const dir of dirs) {
        if (await isExecutable(path.join(dir, name))) {
            return true;
        }
    }
    return false;
}

export const processExecutor: CommandExecutor = {
    run: (command, args, options) => runCommand(command, args, options),
    exists: (name) => commandExists(name),
};

export function formatCommand(result: Pick<CommandResult, 'command' | 'args'>): string {
    return [result.command, ...result.args].join(' ');
}

/**
 * stdout and stderr joined, keeping only the last `maxLines` lines.
 */
export function outputTail(result: Pick<CommandResult, 'stdout' | 'stderr'>, maxLines = 20): string {
    const lines = [result.stdout, result.stderr]
        .filter(text => text.trim().length > 0)
        .join('\n')
        .split('\n');
    return lines.slice(-maxLines).join('\n');
}

/**
 * Throws a ProvisionError carrying the command's kind and output when it failed.
 */
export function assertSucceeded(result: CommandResult, message: string, logFile?: string): void {
    if (!result.errorKind) return;
    throw new ProvisionError(
        result.errorKind,
        `${message}: \`${formatCommand(result)}\` ${describeFailure(result)}`,
        { output: outputTail(result), logFile }
    );
}

export function describeFailure(result: CommandResult): string {
    switch (result.errorKind) {
        case 'NotFound':
            return 'could not be started (command not found)';
        case 'Timeout':
            return `timed out after ${result.durationMs}ms`;
        case 'NonZeroExit':
            return `exited with code ${result.exitCode}`;
        default:
            return 'succeeded';
    }
}
