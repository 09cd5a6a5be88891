export interface ModInfo {
    packageId: string;
    name: string;
    author?: string;
    supportedVersions: string[];
    path: string;
}

export interface VersionTag {
    major: number;
    minor: number;
}

export interface VersionResolution {
    declared: string[];
    available: Array<{ version: string; path: string }>;
    chosen?: string;
    reason: 'declared' | 'highest-available' | 'none';
}

export interface Signature {
    fileCount: number;
    latestMtime: number;
}

export interface DefsSummary {
    readonly totalDefs: number;
    readonly typeCounts: Readonly<Record<string, number>>;
    readonly filesScanned: number;
}

export interface FileDiagnostic {
    filePath: string;
    reason: 'parse_error' | 'not_defs_root';
    detail: string;
}

export interface DefsScanResult {
    summary: DefsSummary;
    diagnostics: FileDiagnostic[];
}

export interface CacheEntry {
    signature: Signature;
    summary: DefsSummary;
}

export interface CacheStats {
    entries: number;
    hits: number;
    misses: number;
}

export interface XmlElement {
    tag: string;
    attributes: Record<string, string>;
    children: XmlElement[];
    text: string;
}

export type XmlParseResult =
    | { ok: true; root: XmlElement }
    | { ok: false; reason: string };
