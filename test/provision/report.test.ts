import { describe, it, beforeEach, afterEach, expect } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { buildReport, countByStatus, failedStep, renderFailure, renderReport, writeReport } from '../../src/provision/report.js';
import type { RunOutcome } from '../../src/provision/runner.js';

const LOGS = { install: '/logs/install.log', deps: '/logs/deps.log' };

const abortedRun: RunOutcome = {
    status: 'aborted',
    interrupted: false,
    notStarted: ['cleanup'],
    results: [
        {
            stepId: 'system-info',
            description: 'Collect system information',
            status: 'succeeded',
            fatal: false,
            output: 'OS: Test Linux\nDefault python: Python 3.11.2',
            warnings: [],
            elapsedMs: 12,
        },
        {
            stepId: 'backup-existing',
            description: 'Move aside existing installations',
            status: 'skipped',
            fatal: true,
            output: '',
            warnings: [],
            elapsedMs: 1,
            skipReason: 'no existing installation found',
        },
        {
            stepId: 'fetch-source',
            description: 'Clone volatility at 9.9',
            status: 'failed',
            fatal: true,
            output: '',
            warnings: ['slow mirror'],
            elapsedMs: 900,
            error: { kind: 'RevisionNotFound', message: 'Revision 9.9 does not exist in https://example.invalid/tool.git' },
        },
    ],
};

function build(outcome: RunOutcome = abortedRun) {
    return buildReport('run-1', outcome, new Date('2024-01-05T07:08:09.000Z'), new Date('2024-01-05T07:08:11.500Z'), LOGS);
}

describe('Report', () => {
    it('should summarise the run', () => {
        const report = build();

        expect(report.durationMs).toBe(2500);
        expect(report.startedAt).toBe('2024-01-05T07:08:09.000Z');
        expect(report.warnings).toEqual(['fetch-source: slow mirror']);
        expect(countByStatus(report)).toEqual({ succeeded: 1, failed: 1, skipped: 1 });
        expect(failedStep(report)?.stepId).toBe('fetch-source');
    });

    it('should render one line per step', () => {
        expect(renderReport(build()).split('\n')).toEqual([
            'Run run-1: ABORTED in 2.5s',
            '  system-info      ok       OS: Test Linux',
            '  backup-existing  skipped  no existing installation found',
            '  fetch-source     FAILED   [RevisionNotFound] Revision 9.9 does not exist in https://example.invalid/tool.git',
            '  cleanup          -        not started',
            '',
            'Warnings:',
            '  - fetch-source: slow mirror',
        ]);
    });

    it('should mark non-fatal failures', () => {
        const report = build({
            status: 'succeeded',
            interrupted: false,
            notStarted: [],
            results: [{
                stepId: 'link-yara',
                description: 'Link libyara.so',
                status: 'failed',
                fatal: false,
                output: '',
                warnings: [],
                elapsedMs: 3,
                error: { kind: 'PermissionDenied', message: 'EACCES' },
            }],
        });

        expect(renderReport(report).split('\n')[1]).toBe('  link-yara  FAILED   [PermissionDenied] EACCES (non-fatal)');
    });

    it('should explain the failure and where to look', () => {
        expect(renderFailure(build()).split('\n')).toEqual([
            'Step "fetch-source" (Clone volatility at 9.9) failed [RevisionNotFound]',
            '  Revision 9.9 does not exist in https://example.invalid/tool.git',
            '',
            'Check the logs: /logs/install.log',
            'Dependency log: /logs/deps.log',
            'Re-running is safe: previous installations are backed up, never deleted.',
        ]);
    });

    describe('writeReport', () => {
        let tempDir: string;

        beforeEach(async () => {
            tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'volprov-report-test-'));
        });

        afterEach(async () => {
            await fs.rm(tempDir, { recursive: true, force: true });
        });

        it('should write the report as JSON', async () => {
            const filePath = await writeReport(tempDir, build());

            expect(filePath).toBe(path.join(tempDir, 'volprov_report_run-1.json'));
            const written = JSON.parse(await fs.readFile(filePath, 'utf-8'));
            expect(written.status).toBe('aborted');
            expect(written.notStarted).toEqual(['cleanup']);
            expect(written.results[2].error.kind).toBe('RevisionNotFound');
        });
    });
});
