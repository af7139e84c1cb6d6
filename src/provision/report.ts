import path from 'node:path';
import { promises as fs } from 'node:fs';
import type { RunOutcome, RunStatus } from './runner.js';
import type { StepResult } from './step.js';

export interface LogFiles {
    install: string;
    deps: string;
}

export interface Report {
    runId: string;
    status: RunStatus;
    startedAt: string;
    finishedAt: string;
    durationMs: number;
    results: StepResult[];
    notStarted: string[];
    interrupted: boolean;
    /** Warnings from every step, prefixed with the step id. */
    warnings: string[];
    logFiles: LogFiles;
}

export function buildReport(
    runId: string,
    outcome: RunOutcome,
    startedAt: Date,
    finishedAt: Date,
    logFiles: LogFiles
): Report {
    return {
        runId,
        status: outcome.status,
        startedAt: startedAt.toISOString(),
        finishedAt: finishedAt.toISOString(),
        durationMs: finishedAt.getTime() - startedAt.getTime(),
        results: outcome.results,
        notStarted: outcome.notStarted,
        interrupted: outcome.interrupted,
        warnings: outcome.results.flatMap(r => r.warnings.map(w => `${r.stepId}: ${w}`)),
        logFiles,
    };
}

/**
 * The fatal failure that aborted the run, or the last failure when none was fatal.
 */
export function failedStep(report: Report): StepResult | undefined {
    const failures = report.results.filter(r => r.status === 'failed');
    return failures.find(r => r.fatal) ?? failures[failures.length - 1];
}

export function countByStatus(report: Report): Record<StepResult['status'], number> {
    const counts = { succeeded: 0, failed: 0, skipped: 0 };
    for (const result of report.results) {
        counts[result.status] += 1;
    }
    return counts;
}

const STATUS_LABEL: Record<StepResult['status'], string> = {
    succeeded: 'ok',
    failed: 'FAILED',
    skipped: 'skipped',
};

/**
 * Plain-text summary table, one line per step.
 */
export function renderReport(report: Report): string {
    const width = Math.max(...report.results.map(r => r.stepId.length), ...report.notStarted.map(id => id.length), 4);
    const lines: string[] = [];
    lines.push(`Run ${report.runId}: ${report.status.toUpperCase()} in ${(report.durationMs / 1000).toFixed(1)}s`);

    for (const result of report.results) {
        let note = '';
        if (result.status === 'skipped') {
            note = result.skipReason ?? '';
        } else if (result.error) {
            note = `[${result.error.kind}] ${result.error.message}`;
        } else if (result.output) {
            note = result.output.split('\n')[0];
        }
        const label = STATUS_LABEL[result.status].padEnd(7);
        const fatal = result.status === 'failed' && !result.fatal ? ' (non-fatal)' : '';
        lines.push(`  ${result.stepId.padEnd(width)}  ${label}  ${note}${fatal}`.trimEnd());
    }

    for (const id of report.notStarted) {
        lines.push(`  ${id.padEnd(width)}  ${'-'.padEnd(7)}  not started`);
    }

    if (report.warnings.length > 0) {
        lines.push('', 'Warnings:');
        for (const warning of report.warnings) {
            lines.push(`  - ${warning}`);
        }
    }

    return lines.join('\n');
}

/**
 * Failure block printed when a run aborts: the step, its output and where to look next.
 */
export function renderFailure(report: Report): string {
    const step = failedStep(report);
    const lines: string[] = [];

    if (step?.error) {
        lines.push(`Step "${step.stepId}" (${step.description}) failed [${step.error.kind}]`);
        lines.push(`  ${step.error.message}`);
        if (step.error.output) {
            lines.push('', 'Command output:');
            lines.push(...step.error.output.split('\n').map(line => `  ${line}`));
        }
    } else {
        lines.push(`Run ${report.status}`);
    }

    lines.push('');
    lines.push(`Check the logs: ${step?.error?.logFile ?? report.logFiles.install}`);
    if (step?.error?.logFile !== report.logFiles.deps) {
        lines.push(`Dependency log: ${report.logFiles.deps}`);
    }
    lines.push('Re-running is safe: previous installations are backed up, never deleted.');
    return lines.join('\n');
}

/**
 * Persists the report as JSON next to the logs and returns the file path.
 */
export async function writeReport(logDir: string, report: Report): Promise<string> {
    await fs.mkdir(logDir, { recursive: true });
    const filepath = path.join(logDir, `volprov_report_${report.runId}.json`);
    await fs.writeFile(filepath, JSON.stringify(report, null, 2) + '\n', 'utf-8');
    return filepath;
}
