import { EventEmitter, once } from 'events';
import fs from 'fs';
import type { Socket } from 'net';
import os from 'os';
import path from 'path';
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { ClientSession, connectToHost, type EditorLauncher, type EditorProcess } from '@tunnedit/client';
import { ConnectionClosedError, setLogLevel } from '@tunnedit/shared';
import type { FileStore } from './fileStore';
import { HostServer } from './server';
import { ShareInUseError } from './shareRegistry';

class FakeEditor extends EventEmitter implements EditorProcess {
    terminated = false;

    constructor(readonly filePath: string) {
        super();
    }

    terminate(): void {
        this.terminated = true;
    }

    async saveAs(content: string): Promise<void> {
        await fs.promises.writeFile(this.filePath, content);
        this.emit('save');
    }

    quit(): void {
        this.emit('exit', 0, null);
    }
}

class FakeLauncher implements EditorLauncher {
    readonly opened: Promise<FakeEditor>;
    private notify: (editor: FakeEditor) => void = () => {};

    constructor() {
        this.opened = new Promise((resolve) => {
            this.notify = resolve;
        });
    }

    open(filePath: string): FakeEditor {
        const editor = new FakeEditor(filePath);
        this.notify(editor);
        return editor;
    }
}

/** Holds `read()` open until released, so a test can act while the host waits on the file. */
class GatedStore implements FileStore {
    readonly reading: Promise<void>;
    private startedReading: () => void = () => {};
    private open: () => void = () => {};
    private readonly gate = new Promise<void>((resolve) => {
        this.open = resolve;
    });

    constructor(readonly path: string) {
        this.reading = new Promise((resolve) => {
            this.startedReading = resolve;
        });
    }

    async read(): Promise<Buffer> {
        this.startedReading();
        await this.gate;
        return Buffer.from('hello');
    }

    async write(): Promise<void> {}

    release(): void {
        this.open();
    }
}

class ObservedHostServer extends HostServer {
    readonly accepted: Socket[] = [];

    protected override handleSocket(socket: Socket): void {
        this.accepted.push(socket);
        super.handleSocket(socket);
    }
}

describe('HostServer', () => {
    let dir: string;
    let workspaceRoot: string;
    let socketPath: string;
    let server: HostServer;

    beforeAll(() => setLogLevel('silent'));
    afterAll(() => setLogLevel('info'));

    beforeEach(async () => {
        dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'tunnedit-e2e-'));
        workspaceRoot = path.join(dir, 'workspaces');
        await fs.promises.mkdir(workspaceRoot);
        socketPath = path.join(dir, 'socket');
        server = new HostServer({ socketPath });
        await server.start();
    });

    afterEach(async () => {
        await server.stop();
        await fs.promises.rm(dir, { recursive: true, force: true });
    });

    async function writeShared(name: string, content: string): Promise<string> {
        const file = path.join(dir, name);
        await fs.promises.writeFile(file, content);
        return file;
    }

    async function openClient() {
        const socket = await connectToHost(socketPath);
        const launcher = new FakeLauncher();
        const client = new ClientSession(socket, { launcher, workspaceRoot });
        const done = client.run();
        const editor = await launcher.opened;
        return { client, done, editor };
    }

    it('creates the socket for its owner only', async () => {
        expect((await fs.promises.stat(socketPath)).mode & 0o777).toBe(0o600);
    });

    it('writes a saved edit back to the shared file', async () => {
        const file = await writeShared('notes.txt', 'hello');
        const shared = server.share(file);

        const { done, editor } = await openClient();
        await editor.saveAs('hello!');
        editor.quit();

        expect(await done).toMatchObject({ filename: 'notes.txt', updatesSent: 1, closeReason: 'editor-exited' });
        expect(await shared).toMatchObject({ updatesApplied: 1, updatesRejected: 0, closeReason: 'peer-closed' });
        expect(await fs.promises.readFile(file, 'utf8')).toBe('hello!');
    });

    it('leaves the file alone when nothing was edited', async () => {
        const file = await writeShared('notes.txt', 'hello');
        const shared = server.share(file);

        const { done, editor } = await openClient();
        editor.quit();

        expect((await done).updatesSent).toBe(0);
        expect((await shared).updatesApplied).toBe(0);
        expect(await fs.promises.readFile(file, 'utf8')).toBe('hello');
    });

    it('closes the editor when the host goes away', async () => {
        const file = await writeShared('notes.txt', 'hello');
        const shared = server.share(file);

        const { done, editor } = await openClient();
        await server.stop();

        expect((await done).closeReason).toBe('host-closed');
        expect(editor.terminated).toBe(true);
        expect((await shared).closeReason).toBe('aborted');
        expect(await fs.promises.readFile(file, 'utf8')).toBe('hello');
    });

    it('serves shared files to clients in the order they were shared', async () => {
        const first = server.share(await writeShared('a.txt', 'A'));
        const second = server.share(await writeShared('b.txt', 'B'));

        const one = await openClient();
        const two = await openClient();
        expect(path.basename(one.editor.filePath)).toBe('a.txt');
        expect(path.basename(two.editor.filePath)).toBe('b.txt');

        one.editor.quit();
        two.editor.quit();
        await Promise.all([one.done, two.done, first, second]);
    });

    it('refuses to share a file twice', async () => {
        const file = await writeShared('notes.txt', 'hello');
        const pending = server.share(file);

        await expect(server.share(file)).rejects.toBeInstanceOf(ShareInUseError);

        await server.stop();
        await expect(pending).rejects.toBeInstanceOf(ConnectionClosedError);
    });

    it('contains a connection error raised while the file is being read', async () => {
        const observedPath = path.join(dir, 'observed.sock');
        const store = new GatedStore(path.join(dir, 'notes.txt'));
        const observed = new ObservedHostServer({ socketPath: observedPath, openStore: () => store });
        await observed.start();

        try {
            const shared = observed.share(store.path);
            const socket = await connectToHost(observedPath);
            await store.reading;

            const [accepted] = observed.accepted;
            expect(() => accepted.emit('error', new Error('read ECONNRESET'))).not.toThrow();

            socket.resume();
            socket.end();
            store.release();
            expect(await shared).toMatchObject({ updatesApplied: 0, closeReason: 'peer-closed' });
        } finally {
            await observed.stop();
        }
    });

    it('hangs up on connections when nothing is shared', async () => {
        const socket = await connectToHost(socketPath);
        socket.resume();

        await once(socket, 'close');
        expect(socket.destroyed).toBe(true);
    });
});
