import type { ErrorKind } from '../core/errors.js';

export type StepStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'skipped';

export type TerminalStepStatus = Extract<StepStatus, 'succeeded' | 'failed' | 'skipped'>;

export interface StepOutcome {
    /** Short human-readable summary of what the action did. */
    output?: string;
    warnings?: string[];
}

export type VerifyOutcome =
    | { ok: true }
    | { ok: false; kind: ErrorKind; message: string };

/**
 * One unit of the provisioning plan. Built once per run and never mutated.
 */
export interface Step<C> {
    readonly id: string;
    readonly description: string;
    /** A failed fatal step aborts the run. */
    readonly fatal: boolean;
    /** A false precondition fails this step instead of skipping it. */
    readonly required?: boolean;
    /** Defaults to true. The confirmation prompt is shown before the first mutating step. */
    readonly mutates?: boolean;
    readonly precondition?: (ctx: C) => Promise<boolean>;
    /** Recorded on the result when the precondition is false. */
    readonly skipReason?: string;
    readonly action: (ctx: C) => Promise<StepOutcome | void>;
    /** Runs only after the action completed without throwing. */
    readonly verify?: (ctx: C) => Promise<VerifyOutcome>;
}

export interface StepError {
    kind: ErrorKind;
    message: string;
    output?: string;
    logFile?: string;
}

export interface StepResult {
    stepId: string;
    description: string;
    status: TerminalStepStatus;
    fatal: boolean;
    output: string;
    warnings: string[];
    elapsedMs: number;
    skipReason?: string;
    error?: StepError;
}

export function defineStep<C>(step: Step<C>): Step<C> {
    return Object.freeze({ ...step });
}
