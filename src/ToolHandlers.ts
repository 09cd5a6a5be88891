import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema, type Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { DefsSummaryCache } from './DefsSummaryCache.js';
import { ModLoader } from './ModLoader.js';
import { StartupImpactMetrics } from './StartupImpactMetrics.js';
import { errorMessage } from './errors.js';

const modPathArgs = z.object({
    modPath: z.string().min(1)
});

const startupImpactArgs = z.object({
    modName: z.string().min(1).optional()
});

export type ToolResult = {
    content: Array<{ type: 'text'; text: string }>;
    isError?: boolean;
};

export interface ToolHandlersContext {
    cache: DefsSummaryCache;
    modLoader: ModLoader;
    metrics: StartupImpactMetrics;
    modDirs: string[];
}

const modPathSchema: Tool['inputSchema'] = {
    type: 'object',
    properties: {
        modPath: { type: 'string', description: 'Path to the mod root directory' }
    },
    required: ['modPath']
};

export const TOOL_DEFINITIONS: Tool[] = [
    {
        name: 'getDefsSummary',
        description: 'Count the definitions of a mod, in total and per def type (cached until its Defs files change)',
        inputSchema: modPathSchema
    },
    {
        name: 'inspectDefs',
        description: 'Rescan a mod without the cache and list the files that were skipped and why',
        inputSchema: modPathSchema
    },
    {
        name: 'resolveVersion',
        description: 'Show which version folder of a mod counts toward its definitions',
        inputSchema: modPathSchema
    },
    {
        name: 'getModList',
        description: 'List the mods found in the configured mod directories with their defs summaries',
        inputSchema: { type: 'object', properties: {} }
    },
    {
        name: 'getStartupImpact',
        description: 'Get startup time per mod as recorded by StartupImpact',
        inputSchema: {
            type: 'object',
            properties: {
                modName: { type: 'string', description: 'Mod name (case-insensitive); omit for all mods' }
            }
        }
    },
    {
        name: 'getStatistics',
        description: 'Get server statistics',
        inputSchema: { type: 'object', properties: {} }
    }
];

export class ToolHandlers {
    private context: ToolHandlersContext;

    constructor(context: ToolHandlersContext) {
        this.context = context;
    }

    setupTools(server: Server): void {
        server.setRequestHandler(ListToolsRequestSchema, async () => ({
            tools: TOOL_DEFINITIONS
        }));

        server.setRequestHandler(CallToolRequestSchema, async (request) => {
            const { name, arguments: args } = request.params;
            return this.callTool(name, args ?? {});
        });
    }

    async callTool(name: string, args: unknown): Promise<ToolResult> {
        try {
            let result: unknown;
            switch (name) {
                case 'getDefsSummary':
                    result = await this.handleGetDefsSummary(modPathArgs.parse(args));
                    break;
                case 'inspectDefs':
                    result = await this.handleInspectDefs(modPathArgs.parse(args));
                    break;
                case 'resolveVersion':
                    result = await this.handleResolveVersion(modPathArgs.parse(args));
                    break;
                case 'getModList':
                    result = await this.handleGetModList();
                    break;
                case 'getStartupImpact':
                    result = await this.handleGetStartupImpact(startupImpactArgs.parse(args));
                    break;
                case 'getStatistics':
                    result = await this.handleGetStatistics();
                    break;
                default:
                    return this.errorResult(`Unknown tool: ${name}`);
            }

            return {
                content: [{
                    type: 'text',
                    text: JSON.stringify(result, null, 2)
                }]
            };
        } catch (error) {
            if (error instanceof z.ZodError) {
                return this.errorResult(`Invalid arguments for ${name}: ${error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
            }
            return this.errorResult(errorMessage(error));
        }
    }

    private errorResult(message: string): ToolResult {
        return {
            content: [{
                type: 'text',
                text: `Error: ${message}`
            }],
            isError: true
        };
    }

    private async handleGetDefsSummary(params: z.infer<typeof modPathArgs>) {
        const summary = await this.context.cache.get(params.modPath);
        return { modPath: params.modPath, ...summary };
    }

    private async handleInspectDefs(params: z.infer<typeof modPathArgs>) {
        const { summary, diagnostics } = await this.context.cache.inspect(params.modPath);
        return { modPath: params.modPath, summary, skipped: diagnostics };
    }

    private async handleResolveVersion(params: z.infer<typeof modPathArgs>) {
        return this.context.cache.versionResolver.explain(params.modPath);
    }

    private async handleGetModList() {
        const mods = await this.context.modLoader.discoverMods(this.context.modDirs);
        const results = [];
        for (const mod of mods) {
            const summary = await this.context.cache.get(mod.path);
            results.push({
                packageId: mod.packageId,
                name: mod.name,
                author: mod.author,
                path: mod.path,
                supportedVersions: mod.supportedVersions,
                totalDefs: summary.totalDefs,
                filesScanned: summary.filesScanned,
                startupMs: await this.context.metrics.totalMsForMod(mod.name)
            });
        }
        return { count: results.length, mods: results };
    }

    private async handleGetStartupImpact(params: z.infer<typeof startupImpactArgs>) {
        if (params.modName) {
            const totalMs = await this.context.metrics.totalMsForMod(params.modName);
            if (totalMs === undefined) {
                return { error: `No startup metrics for '${params.modName}'` };
            }
            return { modName: params.modName, totalMs };
        }

        const metrics = await this.context.metrics.totalMsByModName();
        return {
            count: metrics.size,
            maxTotalMs: await this.context.metrics.maxTotalMs(),
            totalMsByModName: Object.fromEntries(metrics)
        };
    }

    private async handleGetStatistics() {
        const mods = await this.context.modLoader.discoverMods(this.context.modDirs);
        const metrics = await this.context.metrics.totalMsByModName();
        return {
            modDirs: this.context.modDirs,
            mods: mods.length,
            cache: this.context.cache.stats(),
            startupMetrics: metrics.size
        };
    }
}
