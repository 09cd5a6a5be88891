import { join } from 'path';
import type { VersionResolution, VersionTag, XmlElement } from './types.js';
import { XmlReader, localName } from './XmlReader.js';
import { findChildDirectory, findChildFile, isDirectoryEntry, listEntries } from './fsEntries.js';
import { Logger, defaultLogger } from './logger.js';

const VERSION_PATTERN = /(\d+)\.(\d+)/;

/**
 * Extracts the first `major.minor` pair found anywhere in the string, so folder names
 * like `v1.4-beta` still parse.
 */
export function parseVersionTag(value: string): VersionTag | undefined {
    const match = VERSION_PATTERN.exec(value);
    if (!match) return undefined;
    const major = Number.parseInt(match[1], 10);
    const minor = Number.parseInt(match[2], 10);
    if (!Number.isSafeInteger(major) || !Number.isSafeInteger(minor)) return undefined;
    return { major, minor };
}

export function compareVersionTags(a: VersionTag, b: VersionTag): number {
    return a.major !== b.major ? a.major - b.major : a.minor - b.minor;
}

export function formatVersionTag(tag: VersionTag): string {
    return `${tag.major}.${tag.minor}`;
}

function maxVersionTag(tags: VersionTag[]): VersionTag | undefined {
    let best: VersionTag | undefined;
    for (const tag of tags) {
        if (!best || compareVersionTags(tag, best) > 0) best = tag;
    }
    return best;
}

function findElement(element: XmlElement, name: string): XmlElement | undefined {
    if (localName(element.tag).toLowerCase() === name) return element;
    for (const child of element.children) {
        const found = findElement(child, name);
        if (found) return found;
    }
    return undefined;
}

export interface VersionResolverOptions {
    xmlReader?: XmlReader;
    logger?: Logger;
}

export class VersionResolver {
    private xmlReader: XmlReader;
    private logger: Logger;

    constructor(options: VersionResolverOptions = {}) {
        this.xmlReader = options.xmlReader ?? new XmlReader();
        this.logger = options.logger ?? defaultLogger;
    }

    async resolve(modRoot: string): Promise<string | undefined> {
        return (await this.explain(modRoot)).chosen;
    }

    async explain(modRoot: string): Promise<VersionResolution> {
        const declared = await this.readSupportedVersions(modRoot);
        const available = await this.findAvailableVersionDirs(modRoot);
        const describeAvailable = Array.from(available.entries()).map(([version, path]) => ({ version, path }));

        const declaredTags: VersionTag[] = [];
        for (const version of declared) {
            const tag = parseVersionTag(version);
            if (tag && available.has(formatVersionTag(tag))) declaredTags.push(tag);
        }

        const fromDeclared = maxVersionTag(declaredTags);
        if (fromDeclared) {
            return {
                declared,
                available: describeAvailable,
                chosen: available.get(formatVersionTag(fromDeclared)),
                reason: 'declared'
            };
        }

        const highest = maxVersionTag(Array.from(available.keys()).flatMap(key => parseVersionTag(key) ?? []));
        if (highest) {
            return {
                declared,
                available: describeAvailable,
                chosen: available.get(formatVersionTag(highest)),
                reason: 'highest-available'
            };
        }

        return { declared, available: describeAvailable, reason: 'none' };
    }

    async findManifest(modRoot: string): Promise<string | undefined> {
        const aboutDir = await findChildDirectory(modRoot, 'About', this.logger);
        if (!aboutDir) return undefined;
        return findChildFile(aboutDir, 'about.xml', this.logger);
    }

    /**
     * Declared `supportedVersions/li` entries from About.xml, in document order.
     * A missing or unreadable manifest declares nothing.
     */
    async readSupportedVersions(modRoot: string): Promise<string[]> {
        const manifest = await this.findManifest(modRoot);
        if (!manifest) return [];

        const result = await this.xmlReader.readDocument(manifest);
        if (!result.ok) {
            this.logger.debug(`Ignoring unreadable manifest ${manifest}: ${result.reason}`);
            return [];
        }

        const supported = findElement(result.root, 'supportedversions');
        if (!supported) return [];

        return supported.children
            .filter(child => localName(child.tag).toLowerCase() === 'li')
            .map(child => child.text.trim())
            .filter(text => text.length > 0);
    }

    /**
     * Version folders keyed by their normalized `major.minor` form. Entries are visited
     * in sorted order and a later folder parsing to the same version replaces an earlier one.
     */
    async findAvailableVersionDirs(modRoot: string): Promise<Map<string, string>> {
        const mapping = new Map<string, string>();
        for (const entry of await listEntries(modRoot, this.logger)) {
            const tag = parseVersionTag(entry.name);
            if (!tag) continue;
            if (!await isDirectoryEntry(modRoot, entry)) continue;
            mapping.set(formatVersionTag(tag), join(modRoot, entry.name));
        }
        return mapping;
    }
}
