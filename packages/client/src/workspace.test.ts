import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Workspace, safeFileName } from './workspace';

describe('safeFileName', () => {
    it('keeps plain names', () => {
        expect(safeFileName('notes.txt')).toBe('notes.txt');
    });

    it('drops directory parts', () => {
        expect(safeFileName('../../etc/passwd')).toBe('passwd');
        expect(safeFileName('dir\\evil.txt')).toBe('evil.txt');
    });

    it('replaces names that are not files', () => {
        expect(safeFileName('')).toBe('file');
        expect(safeFileName('..')).toBe('file');
        expect(safeFileName('/')).toBe('file');
    });
});

describe('Workspace', () => {
    let root: string;

    beforeEach(async () => {
        root = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'tunnedit-ws-'));
    });

    afterEach(async () => {
        await fs.promises.rm(root, { recursive: true, force: true });
    });

    it('writes the content to a private file named after the shared file', async () => {
        const workspace = await Workspace.create('report.md', Buffer.from('# Title\n'), root);

        expect(path.basename(workspace.filePath)).toBe('report.md');
        expect(path.dirname(workspace.dir)).toBe(root);
        expect((await fs.promises.stat(workspace.dir)).mode & 0o777).toBe(0o700);
        expect((await fs.promises.stat(workspace.filePath)).mode & 0o777).toBe(0o600);
        expect((await workspace.read()).toString()).toBe('# Title\n');
    });

    it('removes everything on dispose', async () => {
        const workspace = await Workspace.create('../escape.txt', Buffer.from('x'), root);
        expect(workspace.filePath).toBe(path.join(workspace.dir, 'escape.txt'));

        await workspace.dispose();

        expect(await fs.promises.readdir(root)).toEqual([]);
    });
});
