import path from 'node:path';
import type { ResolvedPaths, VolprovConfig } from '../core/config.js';

const RULE = '━'.repeat(40);

export function renderUsage(config: VolprovConfig, paths: ResolvedPaths): string {
    const wrapper = path.basename(paths.wrapperPath);
    const commands = [paths.wrapperPath, ...paths.aliasPaths].map(p => path.basename(p));

    return [
        `${config.target.displayName} is installed and ready to use.`,
        '',
        'Run it with any of:',
        ...commands.map(cmd => `  ${cmd} -h`),
        `  ${config.target.interpreter} ${paths.entryPoint} -h`,
        '',
        RULE,
        'QUICK START',
        RULE,
        `  ${wrapper} -f memory.mem imageinfo`,
        `  ${wrapper} -f memory.mem --profile=Win7SP1x64 pslist`,
        `  ${wrapper} -f memory.mem --profile=Win7SP1x64 psxview`,
        `  ${wrapper} -f memory.mem --profile=Win7SP1x64 malfind`,
        `  ${wrapper} -f memory.mem --profile=Win7SP1x64 filescan`,
        '',
        RULE,
        'COMMON WINDOWS PROFILES',
        RULE,
        '  Win7SP1x64         Windows 7 SP1 (64-bit)',
        '  Win7SP1x86         Windows 7 SP1 (32-bit)',
        '  Win10x64_15063     Windows 10 x64 (Build 15063)',
        '  Win10x64_17134     Windows 10 x64 (Build 17134)',
        '  WinXPSP3x86        Windows XP SP3 (32-bit)',
        `  All profiles: ${wrapper} --info | grep Profile`,
        '',
        RULE,
        'LOG FILES',
        RULE,
        `  Installation log: ${paths.installLog}`,
        `  Dependencies log: ${paths.depsLog}`,
        `  Test output:      ${path.join(config.logDir, 'vol_test_wrapper.txt')}`,
        '',
        'Do not run two installs against the same system at once: there is no locking.',
    ].join('\n');
}
