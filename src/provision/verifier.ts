import { promises as fs } from 'node:fs';
import type { Logger } from '../core/logger.js';
import { errorMessage } from '../core/errors.js';
import { type CommandExecutor, type CommandResult, describeFailure, outputTail } from '../tools/command_runner.js';

export interface CheckOutcome {
    passed: boolean;
    detail: string;
}

export interface Check {
    name: string;
    /** Only critical checks decide the aggregate status. */
    critical: boolean;
    run: () => Promise<CheckOutcome>;
}

export interface CheckResult extends CheckOutcome {
    name: string;
    critical: boolean;
}

export interface VerificationReport {
    status: 'pass' | 'fail';
    results: CheckResult[];
    /** Failed non-critical checks. */
    warnings: string[];
    /** Failed critical checks. */
    failures: string[];
}

/**
 * Runs every check in order. A throwing check counts as failed.
 */
export async function runChecks(checks: Check[], logger?: Logger): Promise<VerificationReport> {
    const results: CheckResult[] = [];

    for (const check of checks) {
        let outcome: CheckOutcome;
        try {
            outcome = await check.run();
        } catch (e) {
            outcome = { passed: false, detail: errorMessage(e) };
        }
        results.push({ name: check.name, critical: check.critical, ...outcome });
        logger?.info('Check finished', { check: check.name, critical: check.critical, ...outcome });
        if (!outcome.passed && !check.critical) {
            logger?.debug('Non-critical check failed', { check: check.name, kind: 'NonCriticalCheckFailed' });
        }
    }

    const failed = results.filter(r => !r.passed);
    const failures = failed.filter(r => r.critical).map(r => `${r.name}: ${r.detail}`);
    const warnings = failed.filter(r => !r.critical).map(r => `${r.name}: ${r.detail}`);

    return {
        status: failures.length === 0 ? 'pass' : 'fail',
        results,
        warnings,
        failures,
    };
}

/**
 * Names from `expected` that do not occur in `helpText`, in their original order.
 */
export function findMissingCapabilities(helpText: string, expected: string[]): string[] {
    return expected.filter(name => !helpText.includes(name));
}

export interface DomainCheckOptions {
    executor: CommandExecutor;
    interpreter: string;
    entryPoint: string;
    wrapperPath: string;
    capabilities: string[];
    importChecks: string[];
    /** Wrapper help output is saved here for later inspection. */
    helpOutputFile?: string;
    timeoutMs?: number;
}

function combined(result: CommandResult): string {
    return `${result.stdout}\n${result.stderr}`;
}

/**
 * The smoke tests run after an install: direct and wrapper invocation,
 * expected capabilities in the help text, the yara binding and package imports.
 */
export function buildDomainChecks(opts: DomainCheckOptions): Check[] {
    const { executor, interpreter, entryPoint, wrapperPath, timeoutMs } = opts;
    let directHelp = '';
    let wrapperHelp = '';

    return [
        {
            name: 'direct-invocation',
            critical: true,
            run: async () => {
                const result = await executor.run(interpreter, [entryPoint, '-h'], { timeoutMs });
                if (!result.errorKind) directHelp = combined(result);
                return result.errorKind
                    ? { passed: false, detail: describeFailure(result) }
                    : { passed: true, detail: `${interpreter} ${entryPoint} -h` };
            },
        },
        {
            name: 'wrapper-invocation',
            critical: true,
            run: async () => {
                const result = await executor.run(wrapperPath, ['-h'], { timeoutMs });
                if (opts.helpOutputFile) {
                    await fs.writeFile(opts.helpOutputFile, combined(result), 'utf-8');
                }
                if (!result.errorKind) wrapperHelp = combined(result);
                return result.errorKind
                    ? { passed: false, detail: describeFailure(result) }
                    : { passed: true, detail: `${wrapperPath} -h` };
            },
        },
        {
            name: 'capabilities',
            critical: false,
            run: async () => {
                // Help from whichever invocation worked
                const helpText = wrapperHelp || directHelp;
                const missing = findMissingCapabilities(helpText, opts.capabilities);
                return missing.length === 0
                    ? { passed: true, detail: `all ${opts.capabilities.length} present` }
                    : { passed: false, detail: `missing: ${missing.join(', ')}` };
            },
        },
        {
            name: 'yara-version',
            critical: false,
            run: async () => {
                const result = await executor.run(
                    interpreter,
                    ['-c', "import yara; print('Yara version: ' + yara.__version__)"],
                    { timeoutMs }
                );
                const version = result.stdout.trim();
                return result.errorKind || !version
                    ? { passed: false, detail: 'yara binding could not be imported' }
                    : { passed: true, detail: version };
            },
        },
        {
            name: 'package-imports',
            critical: false,
            run: async () => {
                const statement = opts.importChecks.map(mod => `import ${mod}`).join('; ');
                const result = await executor.run(interpreter, ['-c', statement], { timeoutMs });
                if (result.errorKind) {
                    const lastLine = outputTail(result, 1);
                    return { passed: false, detail: lastLine || describeFailure(result) };
                }
                return { passed: true, detail: opts.importChecks.join(', ') };
            },
        },
    ];
}
