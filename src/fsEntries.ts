import type { Dirent } from 'fs';
import { readdir, stat } from 'fs/promises';
import { join } from 'path';
import { Logger, defaultLogger } from './logger.js';
import { errorMessage } from './errors.js';

/**
 * Directory listing sorted by name, so that every lookup over it is deterministic.
 * A missing or unreadable directory lists as empty.
 */
export async function listEntries(dir: string, logger: Logger = defaultLogger): Promise<Dirent[]> {
    try {
        const entries = await readdir(dir, { withFileTypes: true });
        return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    } catch (error) {
        logger.debug(`Cannot list ${dir}: ${errorMessage(error)}`);
        return [];
    }
}

export async function isDirectoryEntry(parent: string, entry: Dirent): Promise<boolean> {
    if (entry.isDirectory()) return true;
    if (!entry.isSymbolicLink()) return false;
    try {
        return (await stat(join(parent, entry.name))).isDirectory();
    } catch {
        return false;
    }
}

export async function findChildDirectory(
    parent: string,
    name: string,
    logger: Logger = defaultLogger
): Promise<string | undefined> {
    const expected = name.toLowerCase();
    for (const entry of await listEntries(parent, logger)) {
        if (entry.name.toLowerCase() === expected && await isDirectoryEntry(parent, entry)) {
            return join(parent, entry.name);
        }
    }
    return undefined;
}

export async function findChildFile(
    parent: string,
    name: string,
    logger: Logger = defaultLogger
): Promise<string | undefined> {
    const expected = name.toLowerCase();
    for (const entry of await listEntries(parent, logger)) {
        if (entry.name.toLowerCase() === expected && !await isDirectoryEntry(parent, entry)) {
            return join(parent, entry.name);
        }
    }
    return undefined;
}

export async function* walkXmlFiles(dir: string, logger: Logger = defaultLogger): AsyncGenerator<string> {
    const entries = await listEntries(dir, logger);

    // Symlinked directories are not descended into, which keeps the walk free of cycles.
    const directories: string[] = [];
    for (const entry of entries) {
        const fullPath = join(dir, entry.name);
        if (entry.isDirectory()) {
            directories.push(fullPath);
        } else if (await isDirectoryEntry(dir, entry)) {
            continue;
        } else if (entry.name.toLowerCase().endsWith('.xml')) {
            yield fullPath;
        }
    }

    for (const subdir of directories) {
        yield* walkXmlFiles(subdir, logger);
    }
}
