import type { Logger } from '../core/logger.js';
import { ProvisionError, errorMessage, type ErrorKind } from '../core/errors.js';
import type { Step, StepError, StepResult, StepStatus } from './step.js';

export type RunStatus = 'succeeded' | 'aborted' | 'cancelled';

export interface RunOptions {
    logger: Logger;
    /** Stop at the first failed fatal step (default true). */
    failFast?: boolean;
    /** Checked before each step starts; a running step is never cut short. */
    signal?: AbortSignal;
    /** Asked once, before the first mutating step. Returning false or throwing cancels the run. */
    confirmMutation?: () => Promise<boolean>;
    onTransition?: (stepId: string, from: StepStatus, to: StepStatus) => void;
    now?: () => number;
}

export interface RunOutcome {
    status: RunStatus;
    results: StepResult[];
    /** Steps that never left `pending`. */
    notStarted: string[];
    interrupted: boolean;
}

const ALLOWED: Record<StepStatus, StepStatus[]> = {
    pending: ['running', 'skipped', 'failed'],
    running: ['succeeded', 'failed'],
    succeeded: [],
    failed: [],
    skipped: [],
};

/**
 * Per-step state machine. Illegal transitions are programming errors and throw.
 */
export class StepStateTracker {
    private readonly states = new Map<string, StepStatus>();

    constructor(
        stepIds: string[],
        private readonly onTransition?: (stepId: string, from: StepStatus, to: StepStatus) => void
    ) {
        for (const id of stepIds) {
            if (this.states.has(id)) {
                throw new Error(`Duplicate step id: ${id}`);
            }
            this.states.set(id, 'pending');
        }
    }

    get(stepId: string): StepStatus {
        const status = this.states.get(stepId);
        if (!status) throw new Error(`Unknown step: ${stepId}`);
        return status;
    }

    transition(stepId: string, to: StepStatus): void {
        const from = this.get(stepId);
        if (!ALLOWED[from].includes(to)) {
            throw new Error(`Illegal transition for ${stepId}: ${from} -> ${to}`);
        }
        this.states.set(stepId, to);
        this.onTransition?.(stepId, from, to);
    }

    snapshot(): Record<string, StepStatus> {
        return Object.fromEntries(this.states);
    }
}

function errnoKind(code: unknown): ErrorKind {
    if (code === 'EACCES' || code === 'EPERM') return 'PermissionDenied';
    if (code === 'ENOENT') return 'NotFound';
    return 'NonZeroExit';
}

export function toStepError(e: unknown): StepError {
    if (e instanceof ProvisionError) {
        return { kind: e.kind, message: e.message, output: e.output, logFile: e.logFile };
    }
    const code = e instanceof Error && 'code' in e ? e.code : undefined;
    return { kind: errnoKind(code), message: errorMessage(e) };
}

/**
 * Executes `steps` strictly in order against `ctx`.
 *
 * pending -> skipped when the precondition is false (failed if the step is required);
 * pending -> running -> succeeded | failed otherwise.
 * The run is `succeeded` unless a fatal step failed or the run was interrupted.
 */
export async function runPlan<C>(steps: readonly Step<C>[], ctx: C, opts: RunOptions): Promise<RunOutcome> {
    const { logger, failFast = true, signal, confirmMutation, now = Date.now } = opts;
    const tracker = new StepStateTracker(steps.map(s => s.id), opts.onTransition);
    const results: StepResult[] = [];
    const total = steps.length;

    let fatalFailure = false;
    let interrupted = false;
    let confirmed = confirmMutation === undefined;

    for (let i = 0; i < steps.length; i++) {
        const step = steps[i];

        if (signal?.aborted) {
            interrupted = true;
            tracker.transition(step.id, 'failed');
            const error: StepError = { kind: 'Interrupted', message: 'Run interrupted before this step started' };
            logger.error('Step failed', { stepId: step.id, kind: error.kind, error: error.message });
            results.push({
                stepId: step.id,
                description: step.description,
                status: 'failed',
                fatal: step.fatal,
                output: '',
                warnings: [],
                elapsedMs: 0,
                error,
            });
            break;
        }

        if (fatalFailure && failFast) {
            break;
        }

        if (!confirmed && step.mutates !== false && confirmMutation) {
            try {
                confirmed = await confirmMutation();
            } catch (e) {
                logger.warn('Confirmation prompt failed', { stepId: step.id, error: errorMessage(e) });
                confirmed = false;
            }
            if (!confirmed) {
                logger.warn('Installation cancelled by user', { stepId: step.id });
                return {
                    status: 'cancelled',
                    results,
                    notStarted: steps.slice(i).map(s => s.id),
                    interrupted: false,
                };
            }
        }

        const result = await executeStep(step, ctx, tracker, logger, now, i + 1, total);
        results.push(result);

        if (result.status === 'failed' && step.fatal) {
            fatalFailure = true;
        }
    }

    // a terminal Ctrl+C also kills the running child, so its step fails before the next check
    if (!interrupted && signal?.aborted && results.some(r => r.status === 'failed')) {
        interrupted = true;
    }

    const started = new Set(results.map(r => r.stepId));
    const notStarted = steps.filter(s => !started.has(s.id)).map(s => s.id);

    return {
        status: fatalFailure || interrupted ? 'aborted' : 'succeeded',
        results,
        notStarted,
        interrupted,
    };
}

async function executeStep<C>(
    step: Step<C>,
    ctx: C,
    tracker: StepStateTracker,
    logger: Logger,
    now: () => number,
    index: number,
    total: number
): Promise<StepResult> {
    const startedAt = now();
    const base = { stepId: step.id, description: step.description, fatal: step.fatal };
    logger.info('Step started', { stepId: step.id, description: step.description, index, total });

    const fail = (error: StepError, output = '', warnings: string[] = []): StepResult => {
        tracker.transition(step.id, 'failed');
        const elapsedMs = now() - startedAt;
        logger.error('Step failed', { stepId: step.id, kind: error.kind, error: error.message, output: error.output, elapsedMs });
        return { ...base, status: 'failed', output, warnings, elapsedMs, error };
    };

    if (step.precondition) {
        let ready: boolean;
        try {
            ready = await step.precondition(ctx);
        } catch (e) {
            return fail(toStepError(e));
        }
        if (!ready) {
            const reason = step.skipReason ?? 'precondition not met';
            if (step.required) {
                return fail({ kind: 'PreconditionFailed', message: `Required precondition failed: ${reason}` });
            }
            tracker.transition(step.id, 'skipped');
            logger.info('Step skipped', { stepId: step.id, reason });
            return { ...base, status: 'skipped', output: '', warnings: [], elapsedMs: now() - startedAt, skipReason: reason };
        }
    }

    tracker.transition(step.id, 'running');

    let output = '';
    let warnings: string[] = [];
    try {
        const outcome = await step.action(ctx);
        output = outcome?.output ?? '';
        warnings = outcome?.warnings ?? [];
    } catch (e) {
        return fail(toStepError(e), output, warnings);
    }

    if (step.verify) {
        try {
            const verdict = await step.verify(ctx);
            if (!verdict.ok) {
                return fail({ kind: verdict.kind, message: verdict.message }, output, warnings);
            }
        } catch (e) {
            return fail(toStepError(e), output, warnings);
        }
    }

    tracker.transition(step.id, 'succeeded');
    const elapsedMs = now() - startedAt;
    for (const warning of warnings) {
        logger.warn(warning, { stepId: step.id });
    }
    logger.info('Step succeeded', { stepId: step.id, elapsedMs, output });
    return { ...base, status: 'succeeded', output, warnings, elapsedMs };
}
