import { promises as fs } from 'node:fs';
import type { PackageSpec } from '../core/config.js';
import type { Logger } from '../core/logger.js';
import { type CommandExecutor, type CommandResult, describeFailure, formatCommand, outputTail } from './command_runner.js';

export type PackageManagerName = 'apt' | 'pip';

export interface Invocation {
    command: string;
    args: string[];
    env?: NodeJS.ProcessEnv;
}

export interface PackageManager {
    name: PackageManagerName;
    probeCommand: (pkg: string) => Invocation;
    isPresent: (probe: CommandResult) => boolean;
    installCommand: (pkg: string) => Invocation;
}

export type InstallOutcome =
    | { status: 'already-present' }
    | { status: 'installed' }
    | { status: 'failed'; reason: string };

export interface InstallContext {
    executor: CommandExecutor;
    logger: Logger;
    timeoutMs?: number;
    /** Install output is appended here. */
    outputLog?: string;
}

const APT: PackageManager = {
    name: 'apt',
    probeCommand: (pkg) => ({ command: 'dpkg-query', args: ['-W', '-f=${Status}', pkg] }),
    isPresent: (probe) => probe.exitCode === 0 && probe.stdout.includes('install ok installed'),
    installCommand: (pkg) => ({
        command: 'apt-get',
        args: ['install', '-y', pkg],
        env: { ...process.env, DEBIAN_FRONTEND: 'noninteractive' },
    }),
};

export function createPipManager(interpreter: string): PackageManager {
    return {
        name: 'pip',
        probeCommand: (pkg) => ({ command: interpreter, args: ['-m', 'pip', 'show', pkg] }),
        isPresent: (probe) => probe.exitCode === 0,
        installCommand: (pkg) => ({ command: interpreter, args: ['-m', 'pip', 'install', '-U', pkg] }),
    };
}

export function resolvePackageManager(name: PackageManagerName, interpreter: string): PackageManager {
    return name === 'apt' ? APT : createPipManager(interpreter);
}

async function appendOutput(logFile: string | undefined, result: CommandResult): Promise<void> {
    if (!logFile) return;
    const block = `$ ${formatCommand(result)}\n${result.stdout}\n${result.stderr}\n[exit ${result.exitCode}]\n`;
    await fs.appendFile(logFile, block, 'utf-8');
}

/**
 * Refreshes the apt package index (`apt-get update -y`).
 */
export async function refreshIndex(ctx: InstallContext): Promise<CommandResult> {
    const result = await ctx.executor.run('apt-get', ['update', '-y'], {
        timeoutMs: ctx.timeoutMs,
        env: { ...process.env, DEBIAN_FRONTEND: 'noninteractive' },
    });
    await appendOutput(ctx.outputLog, result);
    return result;
}

/**
 * Installs `pkg` unless the manager reports it as present.
 * Never throws for a failed install; the caller decides whether it matters.
 */
export async function ensureInstalled(
    pkg: string,
    manager: PackageManager,
    ctx: InstallContext
): Promise<InstallOutcome> {
    const probe = manager.probeCommand(pkg);
    const probeResult = await ctx.executor.run(probe.command, probe.args, { timeoutMs: ctx.timeoutMs, env: probe.env });
    if (manager.isPresent(probeResult)) {
        ctx.logger.info('Package already present', { package: pkg, manager: manager.name });
        return { status: 'already-present' };
    }

    const install = manager.installCommand(pkg);
    ctx.logger.debug('Installing package', { package: pkg, manager: manager.name, command: formatCommand(install) });
    const result = await ctx.executor.run(install.command, install.args, { timeoutMs: ctx.timeoutMs, env: install.env });
    await appendOutput(ctx.outputLog, result);

    if (result.errorKind) {
        const reason = `\`${formatCommand(result)}\` ${describeFailure(result)}`;
        ctx.logger.debug('Package install output', { package: pkg, output: outputTail(result) });
        return { status: 'failed', reason };
    }

    ctx.logger.info('Package installed', { package: pkg, manager: manager.name });
    return { status: 'installed' };
}

export interface PackageBatchResult {
    outcomes: Array<{ spec: PackageSpec; outcome: InstallOutcome }>;
    /** Non-critical failures. */
    warnings: string[];
    /** Critical failures; any entry here fails the owning step. */
    failures: string[];
}

/**
 * Runs `ensureInstalled` for every spec in order, splitting failures by criticality.
 */
export async function ensurePackages(
    specs: PackageSpec[],
    interpreter: string,
    ctx: InstallContext
): Promise<PackageBatchResult> {
    const batch: PackageBatchResult = { outcomes: [], warnings: [], failures: [] };

    for (const spec of specs) {
        const manager = resolvePackageManager(spec.manager, interpreter);
        const outcome = await ensureInstalled(spec.name, manager, ctx);
        batch.outcomes.push({ spec, outcome });

        if (outcome.status === 'failed') {
            const line = `${spec.name} (${spec.manager}): ${outcome.reason}`;
            if (spec.critical) {
                ctx.logger.error('Package install failed', { package: spec.name, reason: outcome.reason });
                batch.failures.push(line);
            } else {
                ctx.logger.warn(`Optional package ${spec.name} failed to install`, { package: spec.name, reason: outcome.reason });
                batch.warnings.push(line);
            }
        }
    }

    return batch;
}
