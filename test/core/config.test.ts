import { describe, it, beforeEach, afterEach, expect, vi } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { loadConfig, resolveHomeDirectory, resolvePaths } from '../../src/core/config.js';

// Mock dotenv to prevent reloading env vars from .env file
vi.mock('dotenv', () => ({
    default: {
        config: vi.fn(),
    },
}));

describe('Config', () => {
    let tempDir: string;
    let passwdPath: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'volprov-config-test-'));
        passwdPath = path.join(tempDir, 'passwd');
        await fs.writeFile(passwdPath, [
            'root:x:0:0:root:/root:/bin/bash',
            'alice:x:1000:1000:Alice,,,:/srv/alice:/bin/bash',
            '',
        ].join('\n'));
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('should use defaults for a plain root shell', () => {
        const config = loadConfig({ USER: 'root', HOME: '/root' }, {}, passwdPath);

        expect(config.invokingUser).toBe('root');
        expect(config.sudoUser).toBeUndefined();
        expect(config.targetHomeDirectory).toBe('/root');
        expect(config.target.revision).toBe('2.6.1');
        expect(config.target.interpreter).toBe('python2');
        expect(config.binDir).toBe('/usr/local/bin');
        expect(config.logDir).toBe('/tmp');
        expect(config.failFast).toBe(true);
        expect(config.nonInteractive).toBe(false);
        expect(config.strictVerification).toBe(false);
    });

    it('should target the sudo invoker and read their home from passwd', () => {
        const config = loadConfig({ USER: 'root', HOME: '/root', SUDO_USER: 'alice' }, {}, passwdPath);

        expect(config.invokingUser).toBe('alice');
        expect(config.sudoUser).toBe('alice');
        expect(config.targetHomeDirectory).toBe('/srv/alice');
    });

    it('should treat SUDO_USER=root as a plain root run', () => {
        const config = loadConfig({ USER: 'root', HOME: '/root', SUDO_USER: 'root' }, {}, passwdPath);

        expect(config.sudoUser).toBeUndefined();
        expect(config.targetHomeDirectory).toBe('/root');
    });

    it('should let VOLPROV_HOME override the target home', () => {
        const config = loadConfig({ USER: 'root', SUDO_USER: 'alice', VOLPROV_HOME: '/opt/forensics' }, {}, passwdPath);
        expect(config.targetHomeDirectory).toBe('/opt/forensics');
    });

    it('should read settings from env vars', () => {
        const config = loadConfig({
            USER: 'root',
            HOME: '/root',
            VOLPROV_REVISION: 'master',
            VOLPROV_LOG_DIR: '/var/log/volprov',
            VOLPROV_YES: 'true',
            VOLPROV_FAIL_FAST: 'false',
            VOLPROV_MAX_RUN_SECONDS: '900',
        }, {}, passwdPath);

        expect(config.target.revision).toBe('master');
        expect(config.logDir).toBe('/var/log/volprov');
        expect(config.nonInteractive).toBe(true);
        expect(config.failFast).toBe(false);
        expect(config.maxRunSeconds).toBe(900);
    });

    it('should apply flags over env over config file', async () => {
        const configFile = path.join(tempDir, 'volprov.json');
        await fs.writeFile(configFile, JSON.stringify({
            logDir: '/from-file',
            binDir: '/opt/bin',
            target: { revision: 'from-file', interpreter: 'python2.7' },
        }));
        const env = { USER: 'root', HOME: '/root', VOLPROV_LOG_DIR: '/from-env' };

        const fromEnv = loadConfig(env, { configFile }, passwdPath);
        expect(fromEnv.logDir).toBe('/from-env');
        expect(fromEnv.binDir).toBe('/opt/bin');
        expect(fromEnv.target.revision).toBe('from-file');
        expect(fromEnv.target.interpreter).toBe('python2.7');

        const fromFlag = loadConfig({ ...env, VOLPROV_REVISION: 'from-env' }, { configFile, logDir: '/from-flag' }, passwdPath);
        expect(fromFlag.logDir).toBe('/from-flag');
        expect(fromFlag.target.revision).toBe('from-env');
    });

    it('should reject invalid values', () => {
        expect(() => loadConfig({ USER: 'root', HOME: '/root', VOLPROV_COMMAND_TIMEOUT_MS: '0' }, {}, passwdPath)).toThrow();
    });

    describe('resolveHomeDirectory', () => {
        it('should fall back when the user is not in passwd', () => {
            expect(resolveHomeDirectory('bob', passwdPath)).toBe('/home/bob');
            expect(resolveHomeDirectory('root', path.join(tempDir, 'missing'))).toBe('/root');
        });
    });

    describe('resolvePaths', () => {
        it('should derive every path from the config', () => {
            const config = loadConfig({ USER: 'alice', HOME: '/home/alice' }, {}, passwdPath);
            const paths = resolvePaths(config);

            expect(paths).toEqual({
                installDir: '/home/alice/volatility',
                entryPoint: '/home/alice/volatility/vol.py',
                wrapperPath: '/usr/local/bin/vol.py',
                aliasPaths: ['/usr/local/bin/vol2.py', '/usr/local/bin/volatility'],
                installLog: '/tmp/volatility_install.log',
                depsLog: '/tmp/volatility_deps.log',
                getPipPath: '/tmp/get-pip.py',
            });
        });
    });
});
