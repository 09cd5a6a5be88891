import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { ServerConfig, USAGE, parseArgs } from './config.js';
import { DefsSummaryCache } from './DefsSummaryCache.js';
import { ModLoader } from './ModLoader.js';
import { StartupImpactMetrics } from './StartupImpactMetrics.js';
import { ToolHandlers } from './ToolHandlers.js';
import { XmlReader } from './XmlReader.js';
import { Logger, createLogger } from './logger.js';
import { ConfigError, errorMessage } from './errors.js';

class ModDefsSummaryServer {
    private server: Server;
    private config: ServerConfig;
    private logger: Logger;
    private toolHandlers: ToolHandlers;

    constructor(config: ServerConfig) {
        this.config = config;
        this.logger = createLogger(config.logLevel);

        const xmlReader = new XmlReader();
        const cache = new DefsSummaryCache({ xmlReader, logger: this.logger });
        this.toolHandlers = new ToolHandlers({
            cache,
            modLoader: new ModLoader({
                modBatchSize: config.modBatchSize,
                xmlReader,
                versionResolver: cache.versionResolver,
                logger: this.logger
            }),
            metrics: new StartupImpactMetrics(config.metricsFile, xmlReader, this.logger),
            modDirs: config.modDirs
        });

        this.server = new Server(
            {
                name: config.serverName,
                version: config.serverVersion
            },
            {
                capabilities: {
                    tools: {}
                }
            }
        );

        this.toolHandlers.setupTools(this.server);
    }

    async start(): Promise<void> {
        this.logger.info('='.repeat(60));
        this.logger.info(`${this.config.serverName.toUpperCase()} v${this.config.serverVersion}`);
        this.logger.info('='.repeat(60));

        if (this.config.modDirs.length > 0) {
            for (const dir of this.config.modDirs) {
                this.logger.info(`  Mod directory: ${dir}`);
            }
        } else {
            this.logger.info('No mod directories specified; getModList will be empty');
        }
        this.logger.info(`  Startup metrics: ${this.config.metricsFile}`);

        const transport = new StdioServerTransport();
        await this.server.connect(transport);
        this.logger.info('Server ready!');
    }
}

// ============================================================================
// Entry Point
// ============================================================================

function readConfig(): { config: ServerConfig } | { exitCode: number } {
    try {
        const parsed = parseArgs(process.argv.slice(2));
        if (parsed.help) {
            console.error(USAGE);
            return { exitCode: 0 };
        }
        return { config: parsed.config };
    } catch (error) {
        console.error(error instanceof ConfigError ? error.message : `Failed to read arguments: ${errorMessage(error)}`);
        console.error('');
        console.error(USAGE);
        return { exitCode: 1 };
    }
}

function main(): void {
    const result = readConfig();
    if ('exitCode' in result) {
        process.exitCode = result.exitCode;
        return;
    }

    const server = new ModDefsSummaryServer(result.config);

    process.on('SIGINT', () => {
        console.error('\nShutting down server...');
        process.exit(0);
    });

    process.on('SIGTERM', () => {
        console.error('\nShutting down server...');
        process.exit(0);
    });

    server.start().catch(error => {
        console.error('Fatal error:', error);
        process.exit(1);
    });
}

main();
