import { promises as fs } from 'node:fs';
import path from 'node:path';

export interface WrapperOptions {
    /** Shown in diagnostics, e.g. "Volatility 2.6.1". */
    displayName?: string;
    /** Roots for the fallback `find` when no candidate exists. */
    searchRoots?: string[];
    /** `find -path` expression used under each search root. */
    searchPattern?: string;
}

/**
 * Single-quotes a value for bash.
 */
export function shellQuote(value: string): string {
    return `'${value.replace(/'/g, `'\\''`)}'`;
}

const GLOB_TOKEN = /(\*+|\?|\[[\w.!^-]+\])/;

/**
 * Quotes the literal runs of a path pattern and leaves its wildcards bare for bash to expand.
 */
export function globWord(pattern: string): string {
    if (pattern === '') return "''";
    return pattern
        .split(GLOB_TOKEN)
        .filter(part => part !== '')
        .map(part => (GLOB_TOKEN.test(part) ? part : shellQuote(part)))
        .join('');
}

/**
 * Renders a candidate as a bash word; `~/` resolves against `$HOME` when the wrapper runs.
 * A candidate whose wildcard matches nothing stays as written.
 */
function candidateWord(candidate: string): string {
    if (candidate === '~') return '"$HOME"';
    if (candidate.startsWith('~/')) return `"$HOME"/${globWord(candidate.slice(2))}`;
    return globWord(candidate);
}

function bashArray(words: string[]): string {
    if (words.length === 0) return '()';
    return `(\n${words.map(word => `    ${word}`).join('\n')}\n)`;
}

export function renderWrapper(
    interpreterName: string,
    candidateLocations: string[],
    options: WrapperOptions = {}
): string {
    const displayName = options.displayName ?? 'The wrapped tool';
    const searchRoots = options.searchRoots ?? [];
    const searchPattern = options.searchPattern ?? `*/${path.basename(candidateLocations[0] ?? 'main')}`;
    const quotedPattern = shellQuote(searchPattern);

    return `#!/bin/bash
# ${displayName} wrapper.
# Runs the entry point under ${interpreterName} whatever the system default interpreter is.
# Generated by volprov; re-running the installer replaces this file.

RED='\\033[0;31m'
NC='\\033[0m'

INTERPRETER=${shellQuote(interpreterName)}

if ! command -v "$INTERPRETER" > /dev/null 2>&1; then
    echo -e "\${RED}Error: $INTERPRETER is not installed\${NC}" >&2
    echo ${shellQuote(`${displayName} requires ${interpreterName}`)} >&2
    echo "Install it with: sudo apt-get install $INTERPRETER" >&2
    exit 1
fi

CANDIDATES=${bashArray(candidateLocations.map(candidateWord))}
SEARCH_ROOTS=${bashArray(searchRoots.map(shellQuote))}

TARGET=""
for candidate in "\${CANDIDATES[@]}"; do
    if [ -f "$candidate" ]; then
        TARGET="$candidate"
        break
    fi
done

if [ -z "$TARGET" ] && [ \${#SEARCH_ROOTS[@]} -gt 0 ]; then
    TARGET=$(find "\${SEARCH_ROOTS[@]}" -path ${quotedPattern} -type f 2>/dev/null | head -n 1)
fi

if [ -z "$TARGET" ]; then
    echo -e "\${RED}Error: could not find the installation\${NC}" >&2
    echo "Locations tried:" >&2
    for candidate in "\${CANDIDATES[@]}"; do
        echo "  - $candidate" >&2
    done
    for root in "\${SEARCH_ROOTS[@]}"; do
        echo "  - $root (searched for "${quotedPattern}")" >&2
    done
    exit 1
fi

exec "$INTERPRETER" "$TARGET" "$@"
`;
}

/**
 * Writes an executable wrapper at `outputPath`, replacing any existing file.
 */
export async function generateWrapper(
    outputPath: string,
    interpreterName: string,
    candidateLocations: string[],
    options: WrapperOptions = {}
): Promise<void> {
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.rm(outputPath, { force: true });
    await fs.writeFile(outputPath, renderWrapper(interpreterName, candidateLocations, options), { mode: 0o755 });
    await fs.chmod(outputPath, 0o755);
}

/**
 * Points each alias at the wrapper with a symlink, replacing whatever was there.
 */
export async function linkAliases(wrapperPath: string, aliasPaths: string[]): Promise<string[]> {
    for (const alias of aliasPaths) {
        await fs.rm(alias, { force: true });
        await fs.symlink(wrapperPath, alias);
    }
    return aliasPaths;
}

export async function isExecutableFile(filePath: string): Promise<boolean> {
    try {
        const stats = await fs.stat(filePath);
        return stats.isFile() && (stats.mode & 0o111) !== 0;
    } catch {
        return false;
    }
}
