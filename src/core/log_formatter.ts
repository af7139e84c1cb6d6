import { console_log } from './console.js';
import type { LogEntry } from './logger.js';

function str(value: unknown): string | undefined {
    return typeof value === 'string' ? value : undefined;
}

function num(value: unknown): number | undefined {
    return typeof value === 'number' ? value : undefined;
}

/**
 * Intercepts structured logs and outputs pretty console messages
 */
export function formatLogForConsole(entry: LogEntry): void {
    const { level, message } = entry;

    if (level === 'debug') return;

    if (message === 'Provisioning run started') {
        console_log.header(`${str(entry.target) ?? 'TOOLKIT'} INSTALLER`);
        return;
    }

    if (message === 'Step started') {
        const index = num(entry.index);
        const total = num(entry.total);
        const prefix = index !== undefined && total !== undefined ? `[${index}/${total}] ` : '';
        console_log.section(`${prefix}${str(entry.description) ?? str(entry.stepId) ?? ''}`);
        return;
    }

    if (message === 'Step skipped') {
        console_log.dim(`skipped: ${str(entry.reason) ?? 'precondition not met'}`);
        return;
    }

    if (message === 'Step succeeded') {
        const elapsed = num(entry.elapsedMs);
        console_log.success('Done', elapsed !== undefined ? `(${(elapsed / 1000).toFixed(1)}s)` : undefined);
        return;
    }

    if (message === 'Step failed') {
        console_log.error(`${str(entry.stepId) ?? 'Step'} failed`, str(entry.kind) ? `[${str(entry.kind)}]` : undefined);
        if (str(entry.error)) {
            console_log.dim(str(entry.error) ?? '');
        }
        return;
    }

    if (message === 'Package already present') {
        console_log.dim(`${str(entry.package)} already installed`);
        return;
    }

    if (message === 'Package installed') {
        console_log.package(`${str(entry.package)} installed`, str(entry.manager) ? `(${str(entry.manager)})` : undefined);
        return;
    }

    if (message === 'Backup created') {
        console_log.warning(`Found existing ${str(entry.from)}`);
        console_log.success(`Moved to ${str(entry.to)}`);
        return;
    }

    if (message === 'Source fetched') {
        console_log.git(`Checked out ${str(entry.revision)}`, str(entry.commit) ? `(${str(entry.commit)?.slice(0, 7)})` : undefined);
        return;
    }

    if (message === 'Check finished') {
        const passed = entry.passed === true;
        const detail = str(entry.detail);
        console_log.check(passed, `${str(entry.check)}${detail ? ` ${detail}` : ''}`);
        return;
    }

    if (message === 'Provisioning run finished') {
        console_log.divider();
        if (entry.status === 'succeeded') {
            console_log.success('Run completed successfully');
        } else if (entry.status === 'cancelled') {
            console_log.warning('Run cancelled');
        } else {
            console_log.error('Run aborted');
        }
        return;
    }

    if (level === 'error') {
        console_log.error(message);
        return;
    }

    if (level === 'warn') {
        console_log.warning(message);
        return;
    }

    if (entry.event === 'progress') {
        console_log.info(message);
    }
}
