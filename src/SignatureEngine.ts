import { stat } from 'fs/promises';
import type { Signature } from './types.js';
import { DefsFileEnumerator } from './DefsFileEnumerator.js';

export const EMPTY_SIGNATURE: Signature = Object.freeze({ fileCount: 0, latestMtime: 0 });

export function signaturesEqual(a: Signature, b: Signature): boolean {
    return a.fileCount === b.fileCount && a.latestMtime === b.latestMtime;
}

/**
 * Fingerprints the current definitions file set by count and newest mtime (in seconds).
 * File contents are never read, so an edit that keeps the mtime is not detected.
 */
export class SignatureEngine {
    private enumerator: DefsFileEnumerator;

    constructor(enumerator: DefsFileEnumerator) {
        this.enumerator = enumerator;
    }

    async signature(modRoot: string): Promise<Signature> {
        let fileCount = 0;
        let latestMtime = 0;

        for await (const file of this.enumerator.enumerate(modRoot)) {
            fileCount++;
            try {
                const mtime = (await stat(file)).mtimeMs / 1000;
                if (mtime > latestMtime) latestMtime = mtime;
            } catch {
                // Removed between listing and stat; it still counts toward fileCount.
                continue;
            }
        }

        return fileCount === 0 ? { ...EMPTY_SIGNATURE } : { fileCount, latestMtime };
    }
}
