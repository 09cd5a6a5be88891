import fs from 'node:fs';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { VersionResolver, compareVersionTags, parseVersionTag } from '../src/VersionResolver.js';
import { aboutXml, createTempDir, removeDir, writeFile } from './helpers.js';

describe('parseVersionTag', () => {
    it('parses major.minor', () => {
        expect(parseVersionTag('1.4')).toEqual({ major: 1, minor: 4 });
    });

    it('finds the first pair anywhere in the string', () => {
        expect(parseVersionTag('v1.5-beta')).toEqual({ major: 1, minor: 5 });
        expect(parseVersionTag('Mod 2.10 and 3.1')).toEqual({ major: 2, minor: 10 });
    });

    it('rejects strings without a version', () => {
        expect(parseVersionTag('Defs')).toBeUndefined();
        expect(parseVersionTag('1')).toBeUndefined();
    });

    it('orders by major then minor', () => {
        expect(compareVersionTags({ major: 1, minor: 10 }, { major: 1, minor: 9 })).toBeGreaterThan(0);
        expect(compareVersionTags({ major: 1, minor: 5 }, { major: 2, minor: 0 })).toBeLessThan(0);
        expect(compareVersionTags({ major: 1, minor: 4 }, { major: 1, minor: 4 })).toBe(0);
    });
});

describe('VersionResolver', () => {
    let modRoot: string;
    const resolver = new VersionResolver();

    beforeEach(() => {
        modRoot = createTempDir('defs-version-');
    });

    afterEach(() => {
        removeDir(modRoot);
    });

    function makeDirs(...names: string[]) {
        for (const name of names) fs.mkdirSync(path.join(modRoot, name), { recursive: true });
    }

    it('prefers the highest declared version that is present', async () => {
        makeDirs('1.3', '1.4', '1.5');
        writeFile(modRoot, 'About/About.xml', aboutXml(['1.4']));

        expect(await resolver.resolve(modRoot)).toBe(path.join(modRoot, '1.4'));
    });

    it('falls back to the highest folder without a manifest', async () => {
        makeDirs('1.2', '1.5', '1.3');

        expect(await resolver.resolve(modRoot)).toBe(path.join(modRoot, '1.5'));
    });

    it('falls back when no declared version has a folder', async () => {
        makeDirs('1.3', '1.4');
        writeFile(modRoot, 'About/About.xml', aboutXml(['1.5', '1.6']));

        const resolution = await resolver.explain(modRoot);

        expect(resolution.chosen).toBe(path.join(modRoot, '1.4'));
        expect(resolution.reason).toBe('highest-available');
        expect(resolution.declared).toEqual(['1.5', '1.6']);
    });

    it('returns undefined when there are no version folders', async () => {
        makeDirs('Defs', 'Textures');
        writeFile(modRoot, 'About/About.xml', aboutXml(['1.4']));

        const resolution = await resolver.explain(modRoot);

        expect(resolution.chosen).toBeUndefined();
        expect(resolution.reason).toBe('none');
    });

    it('finds the manifest case-insensitively', async () => {
        makeDirs('1.4', '1.5');
        writeFile(modRoot, 'about/ABOUT.XML', aboutXml(['1.4']));

        const resolution = await resolver.explain(modRoot);

        expect(resolution.chosen).toBe(path.join(modRoot, '1.4'));
        expect(resolution.reason).toBe('declared');
    });

    it('treats a malformed manifest as declaring nothing', async () => {
        makeDirs('1.4', '1.5');
        writeFile(modRoot, 'About/About.xml', '<ModMetaData><supportedVersions><li>1.4</li>');

        expect(await resolver.readSupportedVersions(modRoot)).toEqual([]);
        expect(await resolver.resolve(modRoot)).toBe(path.join(modRoot, '1.5'));
    });

    it('reads namespaced and nested supportedVersions', async () => {
        writeFile(
            modRoot,
            'About/About.xml',
            '<m:ModMetaData xmlns:m="urn:meta"><meta><m:SupportedVersions><m:li> 1.4 </m:li><li></li><li>1.5</li></m:SupportedVersions></meta></m:ModMetaData>'
        );

        expect(await resolver.readSupportedVersions(modRoot)).toEqual(['1.4', '1.5']);
    });

    it('ignores files whose names look like versions', async () => {
        makeDirs('1.3');
        writeFile(modRoot, '1.6.txt', 'not a folder');

        expect(await resolver.resolve(modRoot)).toBe(path.join(modRoot, '1.3'));
    });

    it('lets the last folder in sorted order win a version collision', async () => {
        makeDirs('1.4', 'v1.4');

        const available = await resolver.findAvailableVersionDirs(modRoot);

        expect(Array.from(available.entries())).toEqual([['1.4', path.join(modRoot, 'v1.4')]]);
    });

    it('resolves nothing for a missing mod root', async () => {
        expect(await resolver.resolve(path.join(modRoot, 'missing'))).toBeUndefined();
    });
});
