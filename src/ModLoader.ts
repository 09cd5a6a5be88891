import { basename, join } from 'path';
import type { ModInfo, XmlElement } from './types.js';
import { XmlReader, localName } from './XmlReader.js';
import { VersionResolver } from './VersionResolver.js';
import { isDirectoryEntry, listEntries } from './fsEntries.js';
import { Logger, defaultLogger } from './logger.js';

function childText(element: XmlElement, name: string): string | undefined {
    const child = element.children.find(c => localName(c.tag).toLowerCase() === name.toLowerCase());
    const text = child?.text.trim();
    return text ? text : undefined;
}

function listField(element: XmlElement, name: string): string[] {
    const list = element.children.find(c => localName(c.tag).toLowerCase() === name.toLowerCase());
    if (!list) return [];
    return list.children
        .filter(li => localName(li.tag).toLowerCase() === 'li')
        .map(li => li.text.trim())
        .filter(text => text.length > 0);
}

export interface ModLoaderOptions {
    modBatchSize?: number;
    xmlReader?: XmlReader;
    versionResolver?: VersionResolver;
    logger?: Logger;
}

export class ModLoader {
    private modBatchSize: number;
    private xmlReader: XmlReader;
    private versionResolver: VersionResolver;
    private logger: Logger;

    constructor(options: ModLoaderOptions = {}) {
        this.modBatchSize = Math.max(1, options.modBatchSize ?? 10);
        this.xmlReader = options.xmlReader ?? new XmlReader();
        this.logger = options.logger ?? defaultLogger;
        this.versionResolver = options.versionResolver
            ?? new VersionResolver({ xmlReader: this.xmlReader, logger: this.logger });
    }

    /**
     * Every immediate subdirectory of each mods directory is a mod. When two folders
     * declare the same packageId, the first one found wins.
     */
    async discoverMods(modDirs: string[]): Promise<ModInfo[]> {
        const modPaths: string[] = [];

        for (const dirPath of modDirs) {
            const entries = await listEntries(dirPath, this.logger);
            if (entries.length === 0) {
                this.logger.info(`  Skipping ${dirPath} (not found or empty)`);
                continue;
            }
            for (const entry of entries) {
                if (await isDirectoryEntry(dirPath, entry)) {
                    modPaths.push(join(dirPath, entry.name));
                }
            }
        }

        this.logger.info(`  Processing ${modPaths.length} mod directories...`);
        const results = await this.processInBatches(modPaths.map(modPath => () => this.loadModInfo(modPath)));

        const seen = new Set<string>();
        const mods: ModInfo[] = [];
        for (const modInfo of results) {
            if (seen.has(modInfo.packageId)) {
                this.logger.warn(`Duplicate packageId ${modInfo.packageId} at ${modInfo.path}; keeping the first`);
                continue;
            }
            seen.add(modInfo.packageId);
            mods.push(modInfo);
        }
        return mods;
    }

    async loadModInfo(modPath: string): Promise<ModInfo> {
        const folderName = basename(modPath);
        const fallback: ModInfo = { packageId: folderName.toLowerCase(), name: folderName, supportedVersions: [], path: modPath };

        const aboutPath = await this.versionResolver.findManifest(modPath);
        if (!aboutPath) return fallback;

        const result = await this.xmlReader.readDocument(aboutPath);
        if (!result.ok) {
            this.logger.warn(`Failed to load About.xml for ${modPath}:`, result.reason);
            return fallback;
        }

        const meta = result.root;
        const name = childText(meta, 'name') ?? folderName;
        return {
            packageId: (childText(meta, 'packageId') ?? name.replace(/\s/g, '')).toLowerCase(),
            name,
            author: childText(meta, 'author'),
            supportedVersions: listField(meta, 'supportedVersions'),
            path: modPath
        };
    }

    private async processInBatches<T>(tasks: Array<() => Promise<T>>): Promise<T[]> {
        const results: T[] = [];

        for (let i = 0; i < tasks.length; i += this.modBatchSize) {
            const batch = tasks.slice(i, i + this.modBatchSize);
            const batchResults = await Promise.allSettled(batch.map(task => task()));

            for (const result of batchResults) {
                if (result.status === 'fulfilled') {
                    results.push(result.value);
                } else {
                    this.logger.warn('Mod loading failed:', result.reason);
                }
            }
        }

        return results;
    }
}
