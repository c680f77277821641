import { once } from 'events';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { setLogLevel } from '@tunnedit/shared';
import { ExternalEditor, chooseEditor, findExecutable, isGraphicalSession } from './editor';

const nothingOnPath = (): null => null;

describe('chooseEditor', () => {
    it('prefers EDITOR, then VISUAL, then SUDO_EDITOR', () => {
        expect(chooseEditor({ EDITOR: 'editor', VISUAL: 'visual', SUDO_EDITOR: 'sudo_editor' }, nothingOnPath)).toEqual([
            'editor',
        ]);
        expect(chooseEditor({ VISUAL: 'visual', SUDO_EDITOR: 'sudo_editor' }, nothingOnPath)).toEqual(['visual']);
        expect(chooseEditor({ SUDO_EDITOR: 'sudo_editor' }, nothingOnPath)).toEqual(['sudo_editor']);
    });

    it('splits the command on whitespace', () => {
        expect(chooseEditor({ EDITOR: ' code  --wait ' }, nothingOnPath)).toEqual(['code', '--wait']);
    });

    it('falls back to editors on PATH in order of preference', () => {
        const onPath: Record<string, string> = { 'xdg-open': '/usr/bin/xdg-open', nano: '/bin/nano' };
        expect(chooseEditor({}, (name) => onPath[name] ?? null)).toEqual(['/usr/bin/xdg-open']);
    });

    it('ignores an editor variable that points back at tunnedit', () => {
        const which = (name: string) => (name === 'nano' ? '/bin/nano' : null);
        expect(chooseEditor({ EDITOR: 'tunnedit-edit' }, which)).toEqual(['/bin/nano']);
    });

    it('returns null when nothing is available', () => {
        expect(chooseEditor({}, nothingOnPath)).toBeNull();
    });
});

describe('isGraphicalSession', () => {
    it('looks for a display or a terminal program', () => {
        expect(isGraphicalSession({ DISPLAY: ':0' })).toBe(true);
        expect(isGraphicalSession({ WAYLAND_DISPLAY: 'wayland-0' })).toBe(true);
        expect(isGraphicalSession({ TERM_PROGRAM: 'Apple_Terminal' })).toBe(true);
        expect(isGraphicalSession({ DISPLAY: '' })).toBe(false);
        expect(isGraphicalSession({})).toBe(false);
    });
});

describe('findExecutable', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'tunnedit-path-'));
    });

    afterEach(async () => {
        await fs.promises.rm(dir, { recursive: true, force: true });
    });

    it('finds executables and skips plain files', async () => {
        await fs.promises.writeFile(path.join(dir, 'fake-editor'), '#!/bin/sh\n', { mode: 0o755 });
        await fs.promises.writeFile(path.join(dir, 'not-runnable'), 'text', { mode: 0o644 });
        const env = { PATH: ['/nonexistent-dir', dir].join(path.delimiter) };

        expect(findExecutable('fake-editor', env)).toBe(path.join(dir, 'fake-editor'));
        expect(findExecutable('not-runnable', env)).toBeNull();
        expect(findExecutable('fake-editor', {})).toBeNull();
    });
});

describe('ExternalEditor', () => {
    let dir: string;
    let file: string;

    beforeAll(() => setLogLevel('silent'));
    afterAll(() => setLogLevel('info'));

    beforeEach(async () => {
        dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'tunnedit-editor-'));
        file = path.join(dir, 'notes.txt');
        await fs.promises.writeFile(file, 'start');
    });

    afterEach(async () => {
        await fs.promises.rm(dir, { recursive: true, force: true });
    });

    it('passes the file to the command and reports its exit code', async () => {
        const editor = new ExternalEditor(['sh', '-c', 'printf " edited" >> "$0"; exit 3'], file);

        const [code, signal] = await once(editor, 'exit');

        expect(code).toBe(3);
        expect(signal).toBeNull();
        expect(await fs.promises.readFile(file, 'utf8')).toBe('start edited');
    });

    it('reports writes to the file as saves', async () => {
        const editor = new ExternalEditor(['sh', '-c', 'sleep 1; printf " saved" >> "$0"; exec sleep 30'], file, 50);

        await once(editor, 'save');
        const exited = once(editor, 'exit');
        editor.terminate();

        expect(await exited).toEqual([null, 'SIGTERM']);
        expect(await fs.promises.readFile(file, 'utf8')).toBe('start saved');
    });

    it('terminates the editor with SIGTERM', async () => {
        const editor = new ExternalEditor(['sleep', '30'], file);
        const exited = once(editor, 'exit');

        editor.terminate();

        expect(await exited).toEqual([null, 'SIGTERM']);
    });

    it('reports an editor that cannot be started', async () => {
        const editor = new ExternalEditor([path.join(dir, 'missing-editor')], file);
        const errored = once(editor, 'error');
        const exited = once(editor, 'exit');

        const [err] = await errored;
        expect(err).toBeInstanceOf(Error);
        await exited;
    });

    it('rejects an empty command', () => {
        expect(() => new ExternalEditor([], file)).toThrow('Editor command is empty');
    });
});
