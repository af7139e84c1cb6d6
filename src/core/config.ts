import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'node:path';
import os from 'node:os';
import { readFileSync } from 'node:fs';

// Load environment variables from .env file
dotenv.config();

export const PackageSpecSchema = z.object({
    name: z.string().min(1),
    manager: z.enum(['apt', 'pip']),
    /** A failed critical package fails its step; a non-critical one only warns. */
    critical: z.boolean().default(true),
    /** Module name to import when checking the package after install (pip only). */
    importName: z.string().optional(),
});

export type PackageSpec = z.infer<typeof PackageSpecSchema>;

const DEFAULT_PACKAGES: PackageSpec[] = [
    { name: 'python2', manager: 'apt', critical: true },
    { name: 'python2-dev', manager: 'apt', critical: true },
    { name: 'build-essential', manager: 'apt', critical: true },
    { name: 'distorm3', manager: 'pip', critical: false, importName: 'distorm3' },
    { name: 'yara', manager: 'pip', critical: true, importName: 'yara' },
    { name: 'pycrypto', manager: 'pip', critical: false, importName: 'Crypto' },
    { name: 'pillow', manager: 'pip', critical: false },
    { name: 'ujson', manager: 'pip', critical: false },
    { name: 'pytz', manager: 'pip', critical: false },
    { name: 'ipython', manager: 'pip', critical: false },
    { name: 'capstone', manager: 'pip', critical: false },
    { name: 'pycryptodome', manager: 'pip', critical: false },
];

export const InstallTargetSchema = z.object({
    name: z.string().default('volatility'),
    displayName: z.string().default('Volatility 2.6.1'),
    repoUrl: z.string().default('https://github.com/volatilityfoundation/volatility.git'),
    /** Tag, branch or commit checked out after the clone. */
    revision: z.string().default('2.6.1'),
    /** Directory created under the target home directory. */
    installDirName: z.string().default('volatility'),
    /** Entry point, relative to the install directory. */
    entryPoint: z.string().default('vol.py'),
    interpreter: z.string().default('python2'),
    packages: z.array(PackageSpecSchema).default(DEFAULT_PACKAGES),
    /** Names that must show up in the toolkit's help output. */
    capabilities: z.array(z.string()).default(['pslist', 'pstree', 'psxview', 'malfind', 'yarascan', 'filescan']),
    importChecks: z.array(z.string()).default(['volatility', 'distorm3', 'Crypto']),
    patch: z.object({
        match: z.string().default('^#!.*python.*'),
        replacement: z.string().default('#!/usr/bin/env python2'),
    }).default({}),
    /** Ordered entry point locations; `~/` is the target home directory. */
    candidateLocations: z.array(z.string()).default(['~/volatility/vol.py', '/root/volatility/vol.py']),
    searchRoots: z.array(z.string()).default(['/root', '/home']),
    searchPattern: z.string().default('*/volatility/vol.py'),
    library: z.object({
        fileName: z.string().default('libyara.so'),
        roots: z.array(z.string()).default(['/usr/local/lib/python2.7/dist-packages', '/usr']),
        linkPath: z.string().default('/usr/lib/libyara.so'),
    }).default({}),
    getPipUrl: z.string().default('https://bootstrap.pypa.io/pip/2.7/get-pip.py'),
});

export type InstallTarget = z.infer<typeof InstallTargetSchema>;

export const VolprovConfigSchema = z.object({
    target: InstallTargetSchema.default({}),
    /** User who asked for the install (the sudo invoker when present). */
    invokingUser: z.string().min(1),
    /** Set only when the run was started through sudo. */
    sudoUser: z.string().optional(),
    targetHomeDirectory: z.string().min(1),
    binDir: z.string().default('/usr/local/bin'),
    wrapperName: z.string().default('vol.py'),
    aliases: z.array(z.string()).default(['vol2.py', 'volatility']),
    logDir: z.string().default('/tmp'),
    /** Per-command timeout for external processes. */
    commandTimeoutMs: z.number().int().positive().default(600_000),
    /** Run-level budget; 0 disables it. */
    maxRunSeconds: z.number().int().min(0).default(0),
    nonInteractive: z.boolean().default(false),
    /** Stop at the first fatal step failure. */
    failFast: z.boolean().default(true),
    /** Make a failed critical smoke test abort the run. */
    strictVerification: z.boolean().default(false),
});

export type VolprovConfig = z.infer<typeof VolprovConfigSchema>;

export interface ConfigOverrides {
    configFile?: string;
    logDir?: string;
    binDir?: string;
    nonInteractive?: boolean;
    failFast?: boolean;
    strictVerification?: boolean;
    maxRunSeconds?: number;
}

export interface ResolvedPaths {
    installDir: string;
    entryPoint: string;
    wrapperPath: string;
    aliasPaths: string[];
    installLog: string;
    depsLog: string;
    getPipPath: string;
}

export function resolvePaths(config: VolprovConfig): ResolvedPaths {
    const installDir = path.join(config.targetHomeDirectory, config.target.installDirName);
    return {
        installDir,
        entryPoint: path.join(installDir, config.target.entryPoint),
        wrapperPath: path.join(config.binDir, config.wrapperName),
        aliasPaths: config.aliases.map(alias => path.join(config.binDir, alias)),
        installLog: path.join(config.logDir, 'volatility_install.log'),
        depsLog: path.join(config.logDir, 'volatility_deps.log'),
        getPipPath: path.join(config.logDir, 'get-pip.py'),
    };
}

/**
 * Looks up a user's home directory in a passwd-format file.
 * Falls back to /root for root and /home/<user> otherwise.
 */
export function resolveHomeDirectory(user: string, passwdPath = '/etc/passwd'): string {
    let passwd = '';
    try {
        passwd = readFileSync(passwdPath, 'utf-8');
    } catch {
        passwd = '';
    }
    for (const line of passwd.split('\n')) {
        const fields = line.split(':');
        if (fields[0] === user && fields[5]) {
            return fields[5];
        }
    }
    return user === 'root' ? '/root' : path.join('/home', user);
}

function parseIntEnv(value: string | undefined): number | undefined {
    if (value === undefined || value === '') return undefined;
    const parsed = parseInt(value, 10);
    return isNaN(parsed) ? undefined : parsed;
}

function parseBoolEnv(value: string | undefined): boolean | undefined {
    if (value === undefined || value === '') return undefined;
    return value === 'true' || value === '1';
}

function definedOnly(obj: Record<string, unknown>): Record<string, unknown> {
    return Object.fromEntries(Object.entries(obj).filter(([, value]) => value !== undefined));
}

const ConfigFileSchema = z.object({
    target: z.record(z.string(), z.unknown()).optional(),
}).passthrough();

function readConfigFile(filePath: string): z.infer<typeof ConfigFileSchema> {
    const raw: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
    return ConfigFileSchema.parse(raw);
}

/**
 * Builds the run configuration. Precedence: overrides (CLI flags) > env > config file > defaults.
 */
export function loadConfig(
    env: NodeJS.ProcessEnv = process.env,
    overrides: ConfigOverrides = {},
    passwdPath = '/etc/passwd'
): VolprovConfig {
    const configFile = overrides.configFile || env.VOLPROV_CONFIG;
    const fileConfig: z.infer<typeof ConfigFileSchema> = configFile ? readConfigFile(path.resolve(configFile)) : {};

    const sudoUser = env.SUDO_USER && env.SUDO_USER !== 'root' ? env.SUDO_USER : undefined;
    const invokingUser = sudoUser || env.USER || os.userInfo().username;
    const targetHomeDirectory = env.VOLPROV_HOME
        || (sudoUser ? resolveHomeDirectory(sudoUser, passwdPath) : env.HOME || os.homedir());

    const envTarget = definedOnly({
        repoUrl: env.VOLPROV_REPO_URL || undefined,
        revision: env.VOLPROV_REVISION || undefined,
    });

    const envConfig = definedOnly({
        logDir: env.VOLPROV_LOG_DIR || undefined,
        binDir: env.VOLPROV_BIN_DIR || undefined,
        nonInteractive: parseBoolEnv(env.VOLPROV_YES),
        failFast: parseBoolEnv(env.VOLPROV_FAIL_FAST),
        strictVerification: parseBoolEnv(env.VOLPROV_STRICT_VERIFY),
        commandTimeoutMs: parseIntEnv(env.VOLPROV_COMMAND_TIMEOUT_MS),
        maxRunSeconds: parseIntEnv(env.VOLPROV_MAX_RUN_SECONDS),
    });

    const flagValues = definedOnly({
        logDir: overrides.logDir,
        binDir: overrides.binDir,
        nonInteractive: overrides.nonInteractive,
        failFast: overrides.failFast,
        strictVerification: overrides.strictVerification,
        maxRunSeconds: overrides.maxRunSeconds,
    });

    const config = {
        ...fileConfig,
        invokingUser,
        sudoUser,
        targetHomeDirectory,
        ...envConfig,
        ...flagValues,
        target: { ...(fileConfig.target ?? {}), ...envTarget },
    };

    return VolprovConfigSchema.parse(config);
}
