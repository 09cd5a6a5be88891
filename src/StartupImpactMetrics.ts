import { access } from 'fs/promises';
import { homedir } from 'os';
import { join } from 'path';
import { XmlReader } from './XmlReader.js';
import { Logger, defaultLogger } from './logger.js';

export function defaultMetricsFile(): string {
    return join(
        homedir(),
        'AppData', 'LocalLow', 'Ludeon Studios', 'RimWorld by Ludeon Studios', 'StartupImpact', 'metrics.xml'
    );
}

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

/**
 * Per-mod startup time written by the StartupImpact mod. The file is read once per
 * instance and never re-read; treat the result as a snapshot.
 */
export class StartupImpactMetrics {
    private metricsFile: string;
    private xmlReader: XmlReader;
    private logger: Logger;
    private loaded: Promise<Map<string, number>> | null = null;

    constructor(metricsFile: string = defaultMetricsFile(), xmlReader: XmlReader = new XmlReader(), logger: Logger = defaultLogger) {
        this.metricsFile = metricsFile;
        this.xmlReader = xmlReader;
        this.logger = logger;
    }

    /** Keys are lower-cased mod names. */
    totalMsByModName(): Promise<Map<string, number>> {
        if (!this.loaded) {
            this.loaded = this.load();
        }
        return this.loaded;
    }

    async totalMsForMod(modName: string): Promise<number | undefined> {
        return (await this.totalMsByModName()).get(modName.toLowerCase());
    }

    async maxTotalMs(): Promise<number> {
        let max = 0;
        for (const totalMs of (await this.totalMsByModName()).values()) {
            if (totalMs > max) max = totalMs;
        }
        return max;
    }

    private async load(): Promise<Map<string, number>> {
        const metrics = new Map<string, number>();

        try {
            await access(this.metricsFile);
        } catch {
            this.logger.debug(`No startup metrics at ${this.metricsFile}`);
            return metrics;
        }

        const result = await this.xmlReader.readDocument(this.metricsFile);
        if (!result.ok) {
            this.logger.warn(`Failed to parse ${this.metricsFile}:`, result.reason);
            return metrics;
        }

        const mods = result.root.children.find(child => child.tag === 'Mods');
        if (!mods) return metrics;

        for (const mod of mods.children) {
            if (mod.tag !== 'Mod') continue;
            const name = mod.attributes['name'];
            const totalMsText = mod.attributes['totalMs'];
            if (!name || !totalMsText || !INTEGER_PATTERN.test(totalMsText)) continue;

            const totalMs = Number.parseInt(totalMsText, 10);
            if (totalMs <= 0) continue;
            metrics.set(name.toLowerCase(), totalMs);
        }

        return metrics;
    }
}
