import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { ResolvedPaths, VolprovConfig } from '../core/config.js';
import type { Logger } from '../core/logger.js';
import { ProvisionError } from '../core/errors.js';
import { type CommandExecutor, assertSucceeded, outputTail } from '../tools/command_runner.js';
import { type Clock, backup, expandCandidates, findFirst, pathExists } from '../tools/fs_probe.js';
import { fetchSource } from '../tools/git.js';
import { type InstallContext, ensureInstalled, ensurePackages, refreshIndex, resolvePackageManager } from '../tools/package_manager.js';
import { patchFirstLine, verifyFirstLine } from '../tools/patcher.js';
import { generateWrapper, isExecutableFile, linkAliases } from '../tools/wrapper.js';
import { defineStep, type Step } from './step.js';
import { buildDomainChecks, runChecks } from './verifier.js';

export interface ProvisionContext {
    config: VolprovConfig;
    paths: ResolvedPaths;
    executor: CommandExecutor;
    logger: Logger;
    clock: Clock;
}

/**
 * Every path the backup step moves aside: the install directory, the
 * directory of each candidate entry point (wildcards expanded), and the wrapper.
 */
export async function backupTargets(config: VolprovConfig, paths: ResolvedPaths): Promise<string[]> {
    const candidates = await expandCandidates(config.target.candidateLocations, config.targetHomeDirectory);
    const candidateDirs = candidates.map(candidate => path.dirname(candidate));
    return Array.from(new Set([paths.installDir, ...candidateDirs, paths.wrapperPath]));
}

async function anyExists(targets: string[]): Promise<boolean> {
    for (const target of targets) {
        if (await pathExists(target)) return true;
    }
    return false;
}

function installContext(ctx: ProvisionContext, outputLog?: string): InstallContext {
    return {
        executor: ctx.executor,
        logger: ctx.logger,
        timeoutMs: ctx.config.commandTimeoutMs,
        outputLog,
    };
}

async function versionOf(ctx: ProvisionContext, command: string): Promise<string> {
    const result = await ctx.executor.run(command, ['--version'], { timeoutMs: 10_000 });
    if (result.errorKind) return 'not found';
    // python2 prints its version on stderr
    return (result.stdout.trim() || result.stderr.trim()).split('\n')[0];
}

async function osPrettyName(ctx: ProvisionContext): Promise<string> {
    try {
        const osRelease = await fs.readFile('/etc/os-release', 'utf-8');
        const match = osRelease.match(/^PRETTY_NAME="?([^"\n]*)"?$/m);
        if (match) return match[1];
    } catch {
        ctx.logger.debug('No /etc/os-release, falling back to uname');
    }
    const uname = await ctx.executor.run('uname', ['-a'], { timeoutMs: 10_000 });
    return uname.stdout.trim() || 'unknown';
}

/**
 * The fixed install plan, in execution order.
 */
export function buildInstallPlan(config: VolprovConfig): Step<ProvisionContext>[] {
    const target = config.target;
    const interpreter = target.interpreter;

    return [
        defineStep<ProvisionContext>({
            id: 'system-info',
            description: 'Collect system information',
            fatal: false,
            mutates: false,
            action: async (ctx) => {
                const lines = [
                    `OS: ${await osPrettyName(ctx)}`,
                    `Default python: ${await versionOf(ctx, 'python')}`,
                    `python2: ${await versionOf(ctx, interpreter)}`,
                    `python3: ${await versionOf(ctx, 'python3')}`,
                    `Invoking user: ${ctx.config.invokingUser}${ctx.config.sudoUser ? ' (via sudo)' : ''}`,
                    `Target home: ${ctx.config.targetHomeDirectory}`,
                ];
                for (const line of lines) {
                    ctx.logger.info(line, { event: 'progress' });
                }
                return { output: lines.join('\n') };
            },
        }),

        defineStep<ProvisionContext>({
            id: 'backup-existing',
            description: 'Move aside existing installations',
            fatal: true,
            precondition: async (ctx) => anyExists(await backupTargets(ctx.config, ctx.paths)),
            skipReason: 'no existing installation found',
            action: async (ctx) => {
                const moved: string[] = [];
                for (const targetPath of await backupTargets(ctx.config, ctx.paths)) {
                    const result = await backup(targetPath, ctx.clock);
                    if (result.backedUp) {
                        ctx.logger.info('Backup created', { from: result.from, to: result.to });
                        moved.push(`${result.from} -> ${result.to}`);
                    }
                }
                return { output: moved.join('\n') };
            },
        }),

        defineStep<ProvisionContext>({
            id: 'refresh-package-index',
            description: 'Update the system package index',
            fatal: true,
            action: async (ctx) => {
                const result = await refreshIndex(installContext(ctx, ctx.paths.depsLog));
                assertSucceeded(result, 'Package index update failed', ctx.paths.depsLog);
                return { output: 'apt-get update -y' };
            },
        }),

        defineStep<ProvisionContext>({
            id: 'install-git',
            description: 'Ensure git is installed',
            fatal: true,
            action: async (ctx) => {
                const outcome = await ensureInstalled('git', resolvePackageManager('apt', interpreter), installContext(ctx, ctx.paths.depsLog));
                if (outcome.status === 'failed') {
                    throw new ProvisionError('NonZeroExit', `git install failed: ${outcome.reason}`, { logFile: ctx.paths.depsLog });
                }
                return { output: `git ${outcome.status}` };
            },
        }),

        defineStep<ProvisionContext>({
            id: 'install-system-packages',
            description: `Install ${interpreter} and build packages`,
            fatal: true,
            action: async (ctx) => {
                const specs = target.packages.filter(spec => spec.manager === 'apt');
                const batch = await ensurePackages(specs, interpreter, installContext(ctx, ctx.paths.depsLog));
                if (batch.failures.length > 0) {
                    throw new ProvisionError('NonZeroExit', `System packages failed: ${batch.failures.join('; ')}`, { logFile: ctx.paths.depsLog });
                }
                return {
                    output: batch.outcomes.map(o => `${o.spec.name}: ${o.outcome.status}`).join('\n'),
                    warnings: batch.warnings,
                };
            },
        }),

        defineStep<ProvisionContext>({
            id: 'install-pip2',
            description: `Install pip for ${interpreter}`,
            fatal: true,
            precondition: async (ctx) => !(await ctx.executor.exists('pip2')),
            skipReason: 'pip2 already installed',
            action: async (ctx) => {
                const download = await ctx.executor.run('wget', ['-q', '-O', ctx.paths.getPipPath, target.getPipUrl], {
                    timeoutMs: ctx.config.commandTimeoutMs,
                });
                assertSucceeded(download, 'get-pip.py download failed');
                const install = await ctx.executor.run(interpreter, [ctx.paths.getPipPath], {
                    timeoutMs: ctx.config.commandTimeoutMs,
                });
                assertSucceeded(install, 'pip bootstrap failed');
                return { output: 'pip2 installed' };
            },
        }),

        defineStep<ProvisionContext>({
            id: 'upgrade-pip',
            description: 'Upgrade pip and setuptools',
            fatal: true,
            action: async (ctx) => {
                const result = await ctx.executor.run(interpreter, ['-m', 'pip', 'install', '--upgrade', 'pip', 'setuptools'], {
                    timeoutMs: ctx.config.commandTimeoutMs,
                });
                await fs.appendFile(ctx.paths.depsLog, `${result.stdout}\n${result.stderr}\n`, 'utf-8');
                assertSucceeded(result, 'pip upgrade failed', ctx.paths.depsLog);
                return { output: 'pip and setuptools upgraded' };
            },
        }),

        defineStep<ProvisionContext>({
            id: 'install-python-deps',
            description: `Install ${interpreter} dependencies`,
            fatal: true,
            action: async (ctx) => {
                const specs = target.packages.filter(spec => spec.manager === 'pip');
                const batch = await ensurePackages(specs, interpreter, installContext(ctx, ctx.paths.depsLog));
                if (batch.failures.length > 0) {
                    throw new ProvisionError('NonZeroExit', `Required packages failed: ${batch.failures.join('; ')}`, { logFile: ctx.paths.depsLog });
                }

                const warnings = [...batch.warnings];
                const lines: string[] = [];
                for (const spec of specs) {
                    if (!spec.importName) continue;
                    const check = await ctx.executor.run(interpreter, ['-c', `import ${spec.importName}`], { timeoutMs: 60_000 });
                    lines.push(`${check.errorKind ? '✗' : '✓'} ${spec.name}`);
                    if (check.errorKind) {
                        warnings.push(`${spec.name} does not import (${spec.importName})`);
                    }
                }
                return { output: lines.join('\n'), warnings };
            },
        }),

        defineStep<ProvisionContext>({
            id: 'link-yara-library',
            description: `Link ${target.library.fileName}`,
            fatal: false,
            action: async (ctx) => {
                const { fileName, roots, linkPath } = target.library;
                const found = await findFirst([fileName], roots);
                if (!found) {
                    const searched = roots.length > 0 ? roots.join(', ') : '(no search roots)';
                    return { output: 'not linked', warnings: [`${fileName} not found under ${searched}; yara scanning may not work`] };
                }

                const existing = await fs.lstat(linkPath).catch(() => null);
                if (existing && !existing.isSymbolicLink()) {
                    return { output: `found ${found}`, warnings: [`${linkPath} exists and is not a symlink; left untouched`] };
                }
                if (existing) {
                    await fs.rm(linkPath, { force: true });
                }
                await fs.mkdir(path.dirname(linkPath), { recursive: true });
                await fs.symlink(found, linkPath);
                return { output: `${linkPath} -> ${found}` };
            },
        }),

        defineStep<ProvisionContext>({
            id: 'fetch-source',
            description: `Clone ${target.name} at ${target.revision}`,
            fatal: true,
            action: async (ctx) => {
                const fetched = await fetchSource(target.repoUrl, target.revision, ctx.paths.installDir, {
                    executor: ctx.executor,
                    logger: ctx.logger,
                    timeoutMs: ctx.config.commandTimeoutMs,
                });
                return { output: `${target.revision}${fetched.commit ? ` (${fetched.commit})` : ''}` };
            },
        }),

        defineStep<ProvisionContext>({
            id: 'install-toolkit',
            description: `Run setup.py install for ${target.displayName}`,
            fatal: true,
            action: async (ctx) => {
                const result = await ctx.executor.run(interpreter, ['setup.py', 'install'], {
                    cwd: ctx.paths.installDir,
                    timeoutMs: ctx.config.commandTimeoutMs,
                });
                ctx.logger.debug('setup.py output', { stdout: result.stdout, stderr: result.stderr, exitCode: result.exitCode });
                assertSucceeded(result, 'setup.py install failed', ctx.paths.installLog);

                const warnings: string[] = [];
                const owner = ctx.config.sudoUser;
                if (owner) {
                    const chown = await ctx.executor.run('chown', ['-R', `${owner}:${owner}`, ctx.paths.installDir], {
                        timeoutMs: 60_000,
                    });
                    if (chown.errorKind) {
                        warnings.push(`could not hand ${ctx.paths.installDir} back to ${owner}: ${outputTail(chown, 1)}`);
                    }
                }
                return { output: `installed from ${ctx.paths.installDir}`, warnings };
            },
        }),

        defineStep<ProvisionContext>({
            id: 'patch-entry-point',
            description: `Pin the ${target.entryPoint} interpreter line`,
            fatal: true,
            action: async (ctx) => {
                const entryPoint = ctx.paths.entryPoint;
                if (!(await pathExists(entryPoint))) {
                    throw new ProvisionError('NotFound', `Entry point not found: ${entryPoint}`);
                }
                const changed = await patchFirstLine(entryPoint, target.patch.match, target.patch.replacement);
                const stats = await fs.stat(entryPoint);
                await fs.chmod(entryPoint, stats.mode | 0o111);
                return { output: changed ? `first line now ${target.patch.replacement}` : 'first line unchanged' };
            },
            verify: async (ctx) => {
                await verifyFirstLine(ctx.paths.entryPoint, target.patch.replacement);
                return { ok: true };
            },
        }),

        defineStep<ProvisionContext>({
            id: 'generate-wrapper',
            description: 'Create the wrapper and its aliases',
            fatal: true,
            action: async (ctx) => {
                await generateWrapper(ctx.paths.wrapperPath, interpreter, target.candidateLocations, {
                    displayName: target.displayName,
                    searchRoots: target.searchRoots,
                    searchPattern: target.searchPattern,
                });
                const aliases = await linkAliases(ctx.paths.wrapperPath, ctx.paths.aliasPaths);
                return { output: [ctx.paths.wrapperPath, ...aliases].join('\n') };
            },
            verify: async (ctx) => {
                return (await isExecutableFile(ctx.paths.wrapperPath))
                    ? { ok: true }
                    : { ok: false, kind: 'VerificationFailed', message: `${ctx.paths.wrapperPath} is not executable` };
            },
        }),

        defineStep<ProvisionContext>({
            id: 'verify-installation',
            description: 'Smoke-test the installation',
            fatal: config.strictVerification,
            action: async (ctx) => {
                const checks = buildDomainChecks({
                    executor: ctx.executor,
                    interpreter,
                    entryPoint: ctx.paths.entryPoint,
                    wrapperPath: ctx.paths.wrapperPath,
                    capabilities: target.capabilities,
                    importChecks: target.importChecks,
                    helpOutputFile: path.join(ctx.config.logDir, 'vol_test_wrapper.txt'),
                    timeoutMs: ctx.config.commandTimeoutMs,
                });
                const report = await runChecks(checks, ctx.logger);
                if (report.status === 'fail') {
                    throw new ProvisionError('VerificationFailed', `Critical checks failed: ${report.failures.join('; ')}`);
                }
                const passed = report.results.filter(r => r.passed).length;
                return { output: `${passed}/${report.results.length} checks passed`, warnings: report.warnings };
            },
        }),

        defineStep<ProvisionContext>({
            id: 'cleanup',
            description: 'Remove temporary files',
            fatal: false,
            action: async (ctx) => {
                await fs.rm(ctx.paths.getPipPath, { force: true });
                return { output: `removed ${ctx.paths.getPipPath}` };
            },
        }),
    ];
}
