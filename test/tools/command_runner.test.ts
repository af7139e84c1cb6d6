import { describe, it, expect } from 'vitest';
import { ProvisionError } from '../../src/core/errors.js';
import {
    type CommandResult,
    assertSucceeded,
    commandExists,
    describeFailure,
    outputTail,
    runCommand,
} from '../../src/tools/command_runner.js';

function failedResult(overrides: Partial<CommandResult> = {}): CommandResult {
    return {
        command: 'apt-get',
        args: ['update', '-y'],
        exitCode: 100,
        stdout: '',
        stderr: 'E: Could not get lock',
        timedOut: false,
        startTime: 0,
        endTime: 250,
        durationMs: 250,
        errorKind: 'NonZeroExit',
        ...overrides,
    };
}

describe('CommandRunner', () => {
    describe('runCommand', () => {
        it('should run a simple command', async () => {
            const result = await runCommand('sh', ['-c', 'echo "hello"'], { timeoutMs: 5000 });
            expect(result.exitCode).toBe(0);
            expect(result.stdout.trim()).toBe('hello');
            expect(result.timedOut).toBe(false);
            expect(result.errorKind).toBeUndefined();
        });

        it('should pass arguments without a shell', async () => {
            const result = await runCommand('printf', ['%s|', 'a b', '$HOME'], { timeoutMs: 5000 });
            expect(result.stdout).toBe('a b|$HOME|');
        });

        it('should handle non-zero exit code', async () => {
            const result = await runCommand('sh', ['-c', 'exit 3'], { timeoutMs: 5000 });
            expect(result.exitCode).toBe(3);
            expect(result.errorKind).toBe('NonZeroExit');
        });

        it('should capture stderr', async () => {
            const result = await runCommand('sh', ['-c', 'echo "error" >&2'], { timeoutMs: 5000 });
            expect(result.stderr.trim()).toBe('error');
        });

        it('should handle timeout', async () => {
            const result = await runCommand('sleep', ['2'], { timeoutMs: 100 });
            expect(result.timedOut).toBe(true);
            expect(result.errorKind).toBe('Timeout');
        });

        it('should report a missing binary as NotFound', async () => {
            const result = await runCommand('volprov-no-such-binary', ['--version']);
            expect(result.errorKind).toBe('NotFound');
            expect(result.exitCode).toBe(127);
            expect(result.stderr).toBe('volprov-no-such-binary: command not found');
        });

        it('should run in the given directory', async () => {
            const result = await runCommand('pwd', [], { cwd: '/', timeoutMs: 5000 });
            expect(result.stdout.trim()).toBe('/');
        });
    });

    describe('commandExists', () => {
        it('should resolve names against PATH', async () => {
            expect(await commandExists('sh')).toBe(true);
            expect(await commandExists('volprov-no-such-binary')).toBe(false);
            expect(await commandExists('sh', { PATH: '' })).toBe(false);
        });
    });

    describe('outputTail', () => {
        it('should keep the last lines of stdout then stderr', () => {
            expect(outputTail({ stdout: 'a\nb', stderr: 'c' }, 2)).toBe('b\nc');
            expect(outputTail({ stdout: '  ', stderr: 'only stderr' })).toBe('only stderr');
        });
    });

    describe('assertSucceeded', () => {
        it('should throw with the command and its exit code', () => {
            let caught: unknown;
            try {
                assertSucceeded(failedResult(), 'Package index update failed', '/tmp/deps.log');
            } catch (e) {
                caught = e;
            }

            expect(caught).toBeInstanceOf(ProvisionError);
            expect(caught).toMatchObject({
                kind: 'NonZeroExit',
                message: 'Package index update failed: `apt-get update -y` exited with code 100',
                output: 'E: Could not get lock',
                logFile: '/tmp/deps.log',
            });
        });

        it('should not throw for a successful result', () => {
            expect(() => assertSucceeded(failedResult({ exitCode: 0, errorKind: undefined }), 'unused')).not.toThrow();
        });
    });

    describe('describeFailure', () => {
        it('should describe each failure kind', () => {
            expect(describeFailure(failedResult({ errorKind: 'NotFound' }))).toBe('could not be started (command not found)');
            expect(describeFailure(failedResult({ errorKind: 'Timeout' }))).toBe('timed out after 250ms');
            expect(describeFailure(failedResult())).toBe('exited with code 100');
        });
    });
});
