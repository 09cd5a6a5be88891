import { z } from 'zod';
import { LOG_LEVELS } from './logger.js';
import { ConfigError } from './errors.js';
import { defaultMetricsFile } from './StartupImpactMetrics.js';

export const serverConfigSchema = z.object({
    modDirs: z.array(z.string().min(1)).default([]),
    metricsFile: z.string().min(1).default(defaultMetricsFile),
    serverName: z.string().min(1).default('mod-defs-summary'),
    serverVersion: z.string().min(1).default('1.0.0'),
    modBatchSize: z.coerce.number().int().min(1).default(10),
    logLevel: z.enum(LOG_LEVELS).default('info')
});

export type ServerConfig = z.infer<typeof serverConfigSchema>;

export type ParsedArgs =
    | { help: true }
    | { help: false; config: ServerConfig };

function parseModDirectories(dirs: string): string[] {
    if (!dirs || dirs.trim() === '') return [];
    return dirs.split(',').map(path => path.trim()).filter(path => path.length > 0);
}

const FLAGS: Record<string, keyof ServerConfig> = {
    '--metrics-file=': 'metricsFile',
    '--server-name=': 'serverName',
    '--server-version=': 'serverVersion',
    '--mod-batch-size=': 'modBatchSize',
    '--log-level=': 'logLevel'
};

export function parseArgs(args: string[]): ParsedArgs {
    const raw: Record<string, unknown> = {};

    for (const arg of args) {
        if (arg === '--help' || arg === '-h') {
            return { help: true };
        }
        if (arg.startsWith('--mod-dirs=')) {
            raw.modDirs = parseModDirectories(arg.substring('--mod-dirs='.length));
            continue;
        }
        const flag = Object.keys(FLAGS).find(prefix => arg.startsWith(prefix));
        if (flag) {
            raw[FLAGS[flag]] = arg.substring(flag.length);
        }
    }

    const parsed = serverConfigSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigError(parsed.error.issues);
    }
    return { help: false, config: parsed.data };
}

export const USAGE = [
    'Mod Defs Summary MCP Server',
    '',
    'Usage: tsx src/index.ts --mod-dirs=<paths> [options]',
    '',
    'Options:',
    '  --mod-dirs=<paths>          Comma-separated list of mod directories',
    '  --metrics-file=<path>       StartupImpact metrics.xml (default: RimWorld LocalLow folder)',
    '  --server-name=<name>        Server name (default: mod-defs-summary)',
    '  --server-version=<version>  Server version (default: 1.0.0)',
    '  --mod-batch-size=<n>        Number of mods to load in parallel (default: 10)',
    '  --log-level=<level>         Logging level: debug, info, warn, error (default: info)',
    '  --help, -h                  Show this help message',
    '',
    'Example:',
    '  tsx src/index.ts --mod-dirs="/path/to/RimWorld/Mods,/path/to/workshop/content/294100"'
].join('\n');
