import { promises as fs } from 'node:fs';
import path from 'node:path';
import fg from 'fast-glob';

export type BackupResult =
    | { backedUp: true; from: string; to: string }
    | { backedUp: false; from: string };

export type Clock = () => Date;

/**
 * True for files, directories and symlinks (even dangling ones).
 */
export async function pathExists(target: string): Promise<boolean> {
    try {
        await fs.lstat(target);
        return true;
    } catch {
        return false;
    }
}

async function isDirectory(target: string): Promise<boolean> {
    try {
        return (await fs.stat(target)).isDirectory();
    } catch {
        return false;
    }
}

/**
 * Searches `roots` in order and, within each root, `patterns` in order.
 * A pattern without a slash matches that file name at any depth.
 * Ties inside one root/pattern pair go to the lexicographically first path.
 */
export async function findFirst(patterns: string[], roots: string[]): Promise<string | null> {
    for (const root of roots) {
        if (!(await isDirectory(root))) continue;

        for (const pattern of patterns) {
            const glob = pattern.includes('/') ? pattern : `**/${pattern}`;
            const matches = await fg(glob, {
                cwd: root,
                absolute: true,
                dot: true,
                onlyFiles: false,
                followSymbolicLinks: false,
                suppressErrors: true,
            });
            if (matches.length > 0) {
                matches.sort();
                return path.normalize(matches[0]);
            }
        }
    }
    return null;
}

function pad(value: number): string {
    return String(value).padStart(2, '0');
}

/**
 * Local-time `YYYYMMDD_HHMMSS`, the suffix used for backups.
 */
export function formatBackupTimestamp(date: Date): string {
    return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
        `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/**
 * Renames `target` to `<target>_backup_<timestamp>`. A missing target is a no-op.
 * When the backup name is taken, `_1`, `_2`, ... is appended.
 */
export async function backup(target: string, clock: Clock = () => new Date()): Promise<BackupResult> {
    if (!(await pathExists(target))) {
        return { backedUp: false, from: target };
    }

    const base = `${target}_backup_${formatBackupTimestamp(clock())}`;
    let to = base;
    for (let n = 1; await pathExists(to); n++) {
        to = `${base}_${n}`;
    }

    await fs.rename(target, to);
    return { backedUp: true, from: target, to };
}

/**
 * Resolves a `~/`-relative candidate against the given home directory.
 */
export function expandCandidate(pattern: string, home: string): string {
    if (pattern === '~') return home;
    if (pattern.startsWith('~/')) return path.join(home, pattern.slice(2));
    return pattern;
}

/**
 * Expands candidates to concrete paths. Literal candidates pass through whether
 * or not they exist; a wildcard candidate yields its matches in lexicographic order.
 */
export async function expandCandidates(patterns: string[], home: string): Promise<string[]> {
    const expanded: string[] = [];
    for (const pattern of patterns) {
        if (!fg.isDynamicPattern(pattern)) {
            expanded.push(expandCandidate(pattern, home));
            continue;
        }
        const matches = await fg(expandCandidate(pattern, fg.escapePath(home)), {
            absolute: true,
            dot: true,
            onlyFiles: false,
            followSymbolicLinks: false,
            suppressErrors: true,
        });
        matches.sort();
        expanded.push(...matches.map(match => path.normalize(match)));
    }
    return expanded;
}
