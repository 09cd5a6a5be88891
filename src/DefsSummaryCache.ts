import { realpath } from 'fs/promises';
import { resolve } from 'path';
import type { CacheEntry, CacheStats, DefsScanResult, DefsSummary } from './types.js';
import { XmlReader } from './XmlReader.js';
import { VersionResolver } from './VersionResolver.js';
import { DefsFileEnumerator } from './DefsFileEnumerator.js';
import { SignatureEngine, signaturesEqual } from './SignatureEngine.js';
import { DefsScanner, EMPTY_DEFS_SUMMARY } from './DefsScanner.js';
import { KeyedLock } from './KeyedLock.js';
import { Logger, defaultLogger } from './logger.js';
import { errorMessage } from './errors.js';

export async function canonicalModPath(modPath: string): Promise<string> {
    const absolute = resolve(modPath);
    try {
        return await realpath(absolute);
    } catch {
        return absolute;
    }
}

export interface DefsSummaryCacheOptions {
    xmlReader?: XmlReader;
    logger?: Logger;
}

/**
 * Defs summaries keyed by canonical mod path. A stored summary is served while the
 * mod's signature is unchanged; otherwise the mod is rescanned and the entry replaced.
 * Entries live as long as the cache object.
 */
export class DefsSummaryCache {
    readonly versionResolver: VersionResolver;
    readonly enumerator: DefsFileEnumerator;
    private signatureEngine: SignatureEngine;
    private scanner: DefsScanner;
    private logger: Logger;
    private entries: Map<string, CacheEntry> = new Map();
    private lock: KeyedLock = new KeyedLock();
    private hits = 0;
    private misses = 0;

    constructor(options: DefsSummaryCacheOptions = {}) {
        const xmlReader = options.xmlReader ?? new XmlReader();
        this.logger = options.logger ?? defaultLogger;
        this.versionResolver = new VersionResolver({ xmlReader, logger: this.logger });
        this.enumerator = new DefsFileEnumerator(this.versionResolver, this.logger);
        this.signatureEngine = new SignatureEngine(this.enumerator);
        this.scanner = new DefsScanner(this.enumerator, { xmlReader, logger: this.logger });
    }

    async get(modPath: string): Promise<DefsSummary> {
        const key = await canonicalModPath(modPath);

        try {
            return await this.lock.run(key, async () => {
                const signature = await this.signatureEngine.signature(key);
                const cached = this.entries.get(key);
                if (cached && signaturesEqual(cached.signature, signature)) {
                    this.hits++;
                    return cached.summary;
                }

                this.misses++;
                const { summary, diagnostics } = await this.scanner.scanWithDiagnostics(key);
                if (diagnostics.length > 0) {
                    this.logger.debug(`${key}: ${diagnostics.length} file(s) skipped during defs scan`);
                }
                this.entries.set(key, { signature, summary });
                return summary;
            });
        } catch (error) {
            this.logger.error(`Defs summary failed for ${key}: ${errorMessage(error)}`);
            return EMPTY_DEFS_SUMMARY;
        }
    }

    /** Uncached scan with per-file diagnostics. */
    async inspect(modPath: string): Promise<DefsScanResult> {
        return this.scanner.scanWithDiagnostics(await canonicalModPath(modPath));
    }

    stats(): CacheStats {
        return { entries: this.entries.size, hits: this.hits, misses: this.misses };
    }
}

let sharedCache: DefsSummaryCache | null = null;

export function getDefsSummary(modPath: string): Promise<DefsSummary> {
    if (!sharedCache) {
        sharedCache = new DefsSummaryCache();
    }
    return sharedCache.get(modPath);
}
