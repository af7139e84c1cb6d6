import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { Logger } from '../core/logger.js';
import { ProvisionError } from '../core/errors.js';
import { type CommandExecutor, type CommandResult, formatCommand, outputTail } from './command_runner.js';

export interface FetchOptions {
    executor: CommandExecutor;
    logger: Logger;
    gitBinary?: string;
    timeoutMs?: number;
}

export interface FetchResult {
    destDir: string;
    revision: string;
    /** Full hash of the checked-out commit, when git reported one. */
    commit?: string;
}

export type CloneFailureReason = 'repository-not-found' | 'network';

/**
 * Separates "the repository does not exist" from transport problems, based on git's stderr.
 */
export function classifyCloneFailure(stderr: string): CloneFailureReason {
    const lower = stderr.toLowerCase();
    if (lower.includes('not found') || lower.includes('does not exist') || lower.includes('does not appear to be a git repository')) {
        return 'repository-not-found';
    }
    return 'network';
}

function notFound(result: CommandResult, gitBinary: string): ProvisionError {
    return new ProvisionError('NotFound', `git binary not found: ${gitBinary}`, { output: outputTail(result) });
}

/**
 * Clones `repoUrl` into `destDir` and checks out `revision`.
 *
 * An existing `destDir` is removed first: this is a replace, never a merge.
 * On success the caller owns the directory.
 */
export async function fetchSource(
    repoUrl: string,
    revision: string,
    destDir: string,
    opts: FetchOptions
): Promise<FetchResult> {
    const { executor, logger, gitBinary = 'git', timeoutMs } = opts;

    await fs.rm(destDir, { recursive: true, force: true });
    await fs.mkdir(path.dirname(destDir), { recursive: true });

    logger.info('Cloning repository', { repoUrl, destDir, event: 'progress' });
    const clone = await executor.run(gitBinary, ['clone', repoUrl, destDir], { timeoutMs });
    if (clone.errorKind === 'NotFound') {
        throw notFound(clone, gitBinary);
    }
    if (clone.errorKind) {
        const reason = clone.errorKind === 'Timeout' ? 'network' : classifyCloneFailure(clone.stderr);
        throw new ProvisionError(
            'CloneFailed',
            `Clone of ${repoUrl} failed (${reason}): \`${formatCommand(clone)}\` exited with code ${clone.exitCode}`,
            { output: outputTail(clone) }
        );
    }

    const verify = await executor.run(
        gitBinary,
        ['-C', destDir, 'rev-parse', '--verify', '--quiet', `${revision}^{commit}`],
        { timeoutMs }
    );
    if (verify.errorKind) {
        throw new ProvisionError(
            'RevisionNotFound',
            `Revision ${revision} does not exist in ${repoUrl}`,
            { output: outputTail(verify) }
        );
    }
    const commit = verify.stdout.trim() || undefined;

    logger.info('Checking out revision', { revision, event: 'progress' });
    const checkout = await executor.run(gitBinary, ['-C', destDir, 'checkout', '--quiet', revision], { timeoutMs });
    if (checkout.errorKind) {
        throw new ProvisionError(
            'RevisionNotFound',
            `Checkout of ${revision} failed: \`${formatCommand(checkout)}\` exited with code ${checkout.exitCode}`,
            { output: outputTail(checkout) }
        );
    }

    logger.info('Source fetched', { repoUrl, revision, commit, destDir });
    return { destDir, revision, commit };
}
