import type { DefsScanResult, DefsSummary, FileDiagnostic } from './types.js';
import { DefsFileEnumerator } from './DefsFileEnumerator.js';
import { XmlReader, localName } from './XmlReader.js';
import { Logger, defaultLogger } from './logger.js';

export function createDefsSummary(counts: Map<string, number>, filesScanned: number): DefsSummary {
    let totalDefs = 0;
    for (const count of counts.values()) totalDefs += count;

    return Object.freeze({
        totalDefs,
        typeCounts: Object.freeze(Object.fromEntries(counts)),
        filesScanned
    });
}

export const EMPTY_DEFS_SUMMARY: DefsSummary = createDefsSummary(new Map(), 0);

export interface DefsScannerOptions {
    xmlReader?: XmlReader;
    logger?: Logger;
}

export class DefsScanner {
    private enumerator: DefsFileEnumerator;
    private xmlReader: XmlReader;
    private logger: Logger;

    constructor(enumerator: DefsFileEnumerator, options: DefsScannerOptions = {}) {
        this.enumerator = enumerator;
        this.xmlReader = options.xmlReader ?? new XmlReader();
        this.logger = options.logger ?? defaultLogger;
    }

    async scan(modRoot: string): Promise<DefsSummary> {
        return (await this.scanWithDiagnostics(modRoot)).summary;
    }

    /**
     * Counts the immediate children of every `<Defs>` root. Files that fail to parse or
     * have another root are reported in `diagnostics` and left out of the counts.
     */
    async scanWithDiagnostics(modRoot: string): Promise<DefsScanResult> {
        const counts = new Map<string, number>();
        const diagnostics: FileDiagnostic[] = [];
        let filesScanned = 0;

        for await (const filePath of this.enumerator.enumerate(modRoot)) {
            const result = await this.xmlReader.readDocument(filePath);
            if (!result.ok) {
                this.logger.debug(`Defs scan skipped file due to parse error: ${filePath}: ${result.reason}`);
                diagnostics.push({ filePath, reason: 'parse_error', detail: result.reason });
                continue;
            }

            const rootTag = localName(result.root.tag);
            if (rootTag.toLowerCase() !== 'defs') {
                diagnostics.push({ filePath, reason: 'not_defs_root', detail: `Root element is <${rootTag}>` });
                continue;
            }

            filesScanned++;
            for (const child of result.root.children) {
                const defType = localName(child.tag);
                if (!defType) continue;
                counts.set(defType, (counts.get(defType) ?? 0) + 1);
            }
        }

        return { summary: createDefsSummary(counts, filesScanned), diagnostics };
    }
}
