export type ErrorKind =
    | 'PermissionDenied'
    | 'NotFound'
    | 'Timeout'
    | 'NonZeroExit'
    | 'CloneFailed'
    | 'RevisionNotFound'
    | 'PatchVerificationFailed'
    | 'Interrupted'
    | 'NonCriticalCheckFailed'
    | 'PreconditionFailed'
    | 'VerificationFailed';

export interface ProvisionErrorDetails {
    /** Captured command output (stdout + stderr), if any. */
    output?: string;
    /** Log file holding the full output for this failure. */
    logFile?: string;
    cause?: unknown;
}

export class ProvisionError extends Error {
    readonly output?: string;
    readonly logFile?: string;

    constructor(readonly kind: ErrorKind, message: string, details: ProvisionErrorDetails = {}) {
        super(message, details.cause === undefined ? undefined : { cause: details.cause });
        this.name = 'ProvisionError';
        this.output = details.output;
        this.logFile = details.logFile;
    }
}

export function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}
