import fs from 'node:fs';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { StartupImpactMetrics } from '../src/StartupImpactMetrics.js';
import { createTempDir, removeDir, writeFile } from './helpers.js';

const METRICS_XML = `<?xml version="1.0" encoding="utf-8"?>
<StartupImpact>
  <Mods>
    <Mod name="Core" totalMs="1200" />
    <Mod name="Big Mod" totalMs="3400" />
    <Mod name="Idle" totalMs="0" />
    <Mod name="Garbled" totalMs="12.5" />
    <Mod totalMs="10" />
  </Mods>
</StartupImpact>
`;

describe('StartupImpactMetrics', () => {
    let dir: string;

    beforeEach(() => {
        dir = createTempDir('defs-metrics-');
    });

    afterEach(() => {
        removeDir(dir);
    });

    it('maps lower-cased mod names to positive totals', async () => {
        const file = writeFile(dir, 'metrics.xml', METRICS_XML);
        const metrics = new StartupImpactMetrics(file);

        const totals = await metrics.totalMsByModName();

        expect(Object.fromEntries(totals)).toEqual({ core: 1200, 'big mod': 3400 });
        expect(await metrics.maxTotalMs()).toBe(3400);
        expect(await metrics.totalMsForMod('BIG MOD')).toBe(3400);
        expect(await metrics.totalMsForMod('Idle')).toBeUndefined();
    });

    it('loads the file only once', async () => {
        const file = writeFile(dir, 'metrics.xml', METRICS_XML);
        const metrics = new StartupImpactMetrics(file);

        const first = await metrics.totalMsByModName();
        fs.writeFileSync(file, '<StartupImpact><Mods><Mod name="Late" totalMs="5" /></Mods></StartupImpact>');
        const second = await metrics.totalMsByModName();

        expect(second).toBe(first);
        expect(second.has('late')).toBe(false);
    });

    it('is empty when the file is missing', async () => {
        const metrics = new StartupImpactMetrics(path.join(dir, 'missing.xml'));

        expect((await metrics.totalMsByModName()).size).toBe(0);
        expect(await metrics.maxTotalMs()).toBe(0);
    });

    it('is empty when the file cannot be parsed', async () => {
        const file = writeFile(dir, 'metrics.xml', '<StartupImpact><Mods>');
        const metrics = new StartupImpactMetrics(file);

        expect((await metrics.totalMsByModName()).size).toBe(0);
    });

    it('is empty when there is no Mods element', async () => {
        const file = writeFile(dir, 'metrics.xml', '<StartupImpact><Other/></StartupImpact>');

        expect((await new StartupImpactMetrics(file).totalMsByModName()).size).toBe(0);
    });
});
