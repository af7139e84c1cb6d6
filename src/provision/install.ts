import { promises as fs } from 'node:fs';
import { randomUUID } from 'node:crypto';
import { resolvePaths, type ResolvedPaths, type VolprovConfig } from '../core/config.js';
import { createLogger } from '../core/logger.js';
import { console_log } from '../core/console.js';
import { type CommandExecutor, processExecutor } from '../tools/command_runner.js';
import type { Clock } from '../tools/fs_probe.js';
import { buildInstallPlan, type ProvisionContext } from './plan.js';
import { type Report, buildReport, countByStatus, renderFailure, renderReport, writeReport } from './report.js';
import { runPlan } from './runner.js';
import { renderUsage } from './usage.js';

export const EXIT_CODES = {
    succeeded: 0,
    aborted: 1,
    permissionDenied: 2,
    cancelled: 3,
    interrupted: 130,
} as const;

export type ProvisionStatus = 'succeeded' | 'aborted' | 'cancelled' | 'permission-denied';

export interface ProvisionDeps {
    config: VolprovConfig;
    /** Effective-root check; runs before anything touches the disk. */
    isPrivileged: () => boolean;
    executor?: CommandExecutor;
    confirm?: () => Promise<boolean>;
    signal?: AbortSignal;
    clock?: Clock;
    runId?: string;
}

export interface ProvisionResult {
    status: ProvisionStatus;
    exitCode: number;
    paths: ResolvedPaths;
    report?: Report;
    reportPath?: string;
}

function exitCodeFor(report: Report): number {
    if (report.status === 'succeeded') return EXIT_CODES.succeeded;
    if (report.status === 'cancelled') return EXIT_CODES.cancelled;
    return report.interrupted ? EXIT_CODES.interrupted : EXIT_CODES.aborted;
}

/**
 * Combines the caller's signal with the run-level time budget.
 */
function runSignal(signal: AbortSignal | undefined, maxRunSeconds: number): { signal: AbortSignal; dispose: () => void } {
    const controller = new AbortController();
    const onAbort = () => controller.abort(signal?.reason);
    if (signal?.aborted) {
        controller.abort(signal.reason);
    } else {
        signal?.addEventListener('abort', onAbort, { once: true });
    }

    let timer: NodeJS.Timeout | undefined;
    if (maxRunSeconds > 0) {
        timer = setTimeout(() => controller.abort(new Error(`Run exceeded ${maxRunSeconds}s`)), maxRunSeconds * 1000);
        timer.unref();
    }

    return {
        signal: controller.signal,
        dispose: () => {
            if (timer) clearTimeout(timer);
            signal?.removeEventListener('abort', onAbort);
        },
    };
}

/**
 * Runs the whole install: privilege gate, log setup, the plan, the report and the closing output.
 */
export async function provision(deps: ProvisionDeps): Promise<ProvisionResult> {
    const { config } = deps;
    const paths = resolvePaths(config);

    if (!deps.isPrivileged()) {
        console_log.error('[PermissionDenied] This installer must be run as root');
        console_log.dim('Please use: sudo volprov');
        return { status: 'permission-denied', exitCode: EXIT_CODES.permissionDenied, paths };
    }

    const runId = deps.runId ?? randomUUID();
    await fs.mkdir(config.logDir, { recursive: true });
    await fs.writeFile(paths.installLog, '', 'utf-8');
    await fs.writeFile(paths.depsLog, '', 'utf-8');

    const logger = createLogger(runId, { logFile: paths.installLog });
    const clock = deps.clock ?? (() => new Date());
    const startedAt = clock();

    logger.info('Provisioning run started', {
        target: config.target.displayName,
        revision: config.target.revision,
        installDir: paths.installDir,
        invokingUser: config.invokingUser,
    });

    const ctx: ProvisionContext = {
        config,
        paths,
        executor: deps.executor ?? processExecutor,
        logger,
        clock,
    };

    const { signal, dispose } = runSignal(deps.signal, config.maxRunSeconds);
    const confirm = config.nonInteractive ? undefined : deps.confirm;
    const outcome = await runPlan(buildInstallPlan(config), ctx, {
        logger,
        failFast: config.failFast,
        signal,
        confirmMutation: confirm,
        onTransition: (stepId, from, to) => logger.debug('Step state changed', { stepId, from, to }),
    }).finally(dispose);

    const report = buildReport(runId, outcome, startedAt, clock(), { install: paths.installLog, deps: paths.depsLog });
    const reportPath = await writeReport(config.logDir, report);
    logger.info('Provisioning run finished', { status: report.status, ...countByStatus(report), reportPath });

    console.log('\n' + renderReport(report) + '\n');
    if (report.status === 'succeeded') {
        console_log.header('INSTALLATION COMPLETE');
        console.log(renderUsage(config, paths) + '\n');
    } else if (report.status === 'aborted') {
        console_log.header('INSTALLATION FAILED');
        console.log(renderFailure(report) + '\n');
    } else {
        console_log.warning('Installation cancelled; nothing was changed');
    }

    return { status: report.status, exitCode: exitCodeFor(report), paths, report, reportPath };
}
