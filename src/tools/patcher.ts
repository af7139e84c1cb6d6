import { promises as fs } from 'node:fs';
import { ProvisionError } from '../core/errors.js';

interface SplitFirstLine {
    firstLine: string;
    /** Everything after the first line, starting with its terminator. */
    rest: Buffer;
}

function splitFirstLine(content: Buffer): SplitFirstLine {
    const newline = content.indexOf(0x0a);
    let end = newline === -1 ? content.length : newline;
    if (end > 0 && content[end - 1] === 0x0d) {
        end -= 1;
    }
    return {
        firstLine: content.subarray(0, end).toString('utf-8'),
        rest: content.subarray(end),
    };
}

export async function readFirstLine(filePath: string): Promise<string> {
    return splitFirstLine(await fs.readFile(filePath)).firstLine;
}

/**
 * Replaces the first line of `filePath` with `replacement` when it matches `matchPattern`.
 * Bytes after the first line, including its terminator, are written back untouched.
 *
 * @returns true when the file was rewritten
 */
export async function patchFirstLine(
    filePath: string,
    matchPattern: RegExp | string,
    replacement: string
): Promise<boolean> {
    const content = await fs.readFile(filePath);
    const { firstLine, rest } = splitFirstLine(content);
    const pattern = typeof matchPattern === 'string' ? new RegExp(matchPattern) : matchPattern;

    if (!pattern.test(firstLine) || firstLine === replacement) {
        return false;
    }

    await fs.writeFile(filePath, Buffer.concat([Buffer.from(replacement, 'utf-8'), rest]));
    return true;
}

/**
 * Re-reads the first line and throws PatchVerificationFailed unless it equals `expected`.
 */
export async function verifyFirstLine(filePath: string, expected: string): Promise<void> {
    const actual = await readFirstLine(filePath);
    if (actual !== expected) {
        throw new ProvisionError(
            'PatchVerificationFailed',
            `First line of ${filePath} is "${actual}", expected "${expected}"`
        );
    }
}
