import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { DefsFileEnumerator } from '../src/DefsFileEnumerator.js';

export function createTempDir(prefix = 'defs-summary-'): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

export function writeFile(root: string, relPath: string, content: string): string {
    const fullPath = path.join(root, relPath);
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    fs.writeFileSync(fullPath, content);
    return fullPath;
}

export function defsXml(...children: string[]): string {
    return `<?xml version="1.0" encoding="utf-8"?>\n<Defs>\n${children.map(c => `  ${c}`).join('\n')}\n</Defs>\n`;
}

export function aboutXml(supportedVersions: string[], extra = ''): string {
    const items = supportedVersions.map(v => `<li>${v}</li>`).join('');
    return `<?xml version="1.0" encoding="utf-8"?>\n<ModMetaData>${extra}<supportedVersions>${items}</supportedVersions></ModMetaData>\n`;
}

export async function listDefsFiles(enumerator: DefsFileEnumerator, modRoot: string): Promise<string[]> {
    const files: string[] = [];
    for await (const file of enumerator.enumerate(modRoot)) {
        files.push(file);
    }
    return files;
}
