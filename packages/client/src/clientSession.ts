// ─── Tunnedit Client: Client Session ─────────────────────────────────────────

import { EventEmitter } from 'events';
import os from 'os';
import type { Duplex } from 'stream';
import {
    ConnectionClosedError,
    DEFAULT_FRAME_LIMITS,
    FrameReader,
    IncompleteFrameError,
    PROTOCOL_VERSION,
    ProtocolError,
    SUPPORTED_VERSIONS,
    buildUpdateFrame,
    createLogger,
    differentialUpdate,
    digest,
    fullUpdate,
    readInitialFrame,
    writeFrame,
    type FrameLimits,
    type Logger,
    type SessionState,
    type UpdateMode,
    type UpdatePayload,
} from '@tunnedit/shared';
import type { EditorLauncher, EditorProcess } from './editor';
import { Workspace } from './workspace';

export enum ClientSessionState {
    IDLE = 'Idle',
    CONNECTED = 'Connected',
    EDITING = 'Editing',
    SENDING_UPDATE = 'SendingUpdate',
    EXITING = 'Exiting',
    CLOSED = 'Closed',
}

export type ClientCloseReason = 'editor-exited' | 'host-closed' | 'failed';

export interface SentUpdate {
    kind: UpdatePayload['kind'];
    filesize: number;
    bytes: number;
}

export interface ClientSessionSummary {
    filename: string;
    updatesSent: number;
    closeReason: ClientCloseReason;
}

export interface ClientSessionEvents {
    state: (state: ClientSessionState) => void;
    opened: (filePath: string) => void;
    sent: (update: SentUpdate) => void;
}

export interface ClientSessionOptions {
    launcher: EditorLauncher;
    mode?: UpdateMode;
    limits?: FrameLimits;
    supportedVersions?: readonly string[];
    /** Directory the private workspace is created in. */
    workspaceRoot?: string;
    logger?: Logger;
}

const TRANSITIONS: Record<ClientSessionState, ClientSessionState[]> = {
    [ClientSessionState.IDLE]: [ClientSessionState.CONNECTED, ClientSessionState.CLOSED],
    [ClientSessionState.CONNECTED]: [ClientSessionState.EDITING, ClientSessionState.CLOSED],
    [ClientSessionState.EDITING]: [
        ClientSessionState.SENDING_UPDATE,
        ClientSessionState.EXITING,
        ClientSessionState.CLOSED,
    ],
    [ClientSessionState.SENDING_UPDATE]: [ClientSessionState.EDITING, ClientSessionState.CLOSED],
    [ClientSessionState.EXITING]: [ClientSessionState.CLOSED],
    [ClientSessionState.CLOSED]: [],
};

export interface ClientSession {
    on<E extends keyof ClientSessionEvents>(event: E, listener: ClientSessionEvents[E]): this;
    once<E extends keyof ClientSessionEvents>(event: E, listener: ClientSessionEvents[E]): this;
    emit<E extends keyof ClientSessionEvents>(event: E, ...args: Parameters<ClientSessionEvents[E]>): boolean;
}

/**
 * Receives a file from the host, opens it in an editor and sends every saved
 * change back.
 *
 * Saves are handled one at a time in the order they happen. Each update is
 * computed against the last content sent, so the host sees a cumulative
 * chain. When the editor exits the working copy is compared one last time;
 * when the host goes away the editor is asked to quit and nothing more is sent.
 */
export class ClientSession extends EventEmitter {
    private state: ClientSessionState = ClientSessionState.IDLE;
    private session: SessionState | null = null;
    private readonly reader: FrameReader;
    private readonly launcher: EditorLauncher;
    private readonly mode: UpdateMode;
    private readonly supportedVersions: readonly string[];
    private readonly workspaceRoot: string;
    private readonly log: Logger;
    private queue: Promise<void> = Promise.resolve();
    private hostClosed = false;
    private updatesSent = 0;

    constructor(
        private readonly socket: Duplex,
        options: ClientSessionOptions,
    ) {
        super();
        this.launcher = options.launcher;
        this.mode = options.mode ?? 'differential';
        this.supportedVersions = options.supportedVersions ?? SUPPORTED_VERSIONS;
        this.workspaceRoot = options.workspaceRoot ?? os.tmpdir();
        this.log = options.logger ?? createLogger('Client');
        this.reader = new FrameReader(socket, options.limits ?? DEFAULT_FRAME_LIMITS);
    }

    /**
     * Run the whole edit: receive, edit, send updates, close.
     *
     * @throws UnsupportedVersionError before anything is written locally
     * @throws ProtocolError when the host's frames are malformed
     */
    async run(): Promise<ClientSessionSummary> {
        if (this.state !== ClientSessionState.IDLE) {
            throw new Error('ClientSession.run() may only be called once');
        }
        this.transition(ClientSessionState.CONNECTED);

        let workspace: Workspace | null = null;
        try {
            const frame = await this.reader.next();
            if (!frame) {
                throw new ConnectionClosedError('Host closed the connection before sending a file');
            }
            const initial = readInitialFrame(frame, this.supportedVersions);
            this.session = {
                role: 'client',
                protocolVersion: PROTOCOL_VERSION,
                filename: initial.filename,
                baseContent: initial.content,
                lastAppliedFilesize: initial.content.length,
                lastChecksum: digest(initial.content),
            };
            this.log.info(`Received ${initial.filename}`, { filesize: initial.content.length });

            workspace = await Workspace.create(initial.filename, initial.content, this.workspaceRoot);
            const editor = this.launcher.open(workspace.filePath);
            this.emit('opened', workspace.filePath);
            this.transition(ClientSessionState.EDITING);

            const reason = await this.edit(editor, workspace, this.session);
            return this.finish(reason);
        } catch (err) {
            this.socket.destroy();
            this.finish('failed');
            throw err;
        } finally {
            if (workspace) await workspace.dispose();
        }
    }

    getState(): ClientSessionState {
        return this.state;
    }

    /** Resolves once the editor has exited or the host has gone away. */
    private edit(editor: EditorProcess, workspace: Workspace, session: SessionState): Promise<ClientCloseReason> {
        return new Promise((resolve, reject) => {
            let settled = false;
            const settle = (outcome: () => void) => {
                if (settled) return;
                settled = true;
                outcome();
            };

            const fail = (err: unknown) => {
                if (settled) return;
                if (this.isHostGone(err)) {
                    this.onHostClosed(editor);
                    settle(() => resolve('host-closed'));
                    return;
                }
                editor.terminate();
                settle(() => reject(err));
            };

            const enqueue = (task: () => Promise<void>) => {
                this.queue = this.queue.then(() => (settled ? undefined : task())).catch(fail);
            };

            editor.on('save', () => enqueue(() => this.syncChanges(workspace, session)));
            editor.on('exit', (code, signal) => {
                this.log.debug('Editor exited', { code, signal });
                enqueue(async () => {
                    this.transition(ClientSessionState.EXITING);
                    await this.syncChanges(workspace, session);
                    settle(() => resolve('editor-exited'));
                });
            });
            editor.on('error', (err) => this.log.error(`Editor failed: ${err.message}`));

            // The host sends nothing after the initial frame; the next read only ends when it hangs up.
            void this.reader.next().then((frame) => {
                if (frame) {
                    fail(new ProtocolError('Unexpected frame from host after the initial file'));
                    return;
                }
                if (settled) return;
                this.onHostClosed(editor);
                settle(() => resolve('host-closed'));
            }, fail);
        });
    }

    private isHostGone(err: unknown): boolean {
        return err instanceof IncompleteFrameError || err instanceof ConnectionClosedError || this.reader.isEnded();
    }

    private onHostClosed(editor: EditorProcess): void {
        this.hostClosed = true;
        this.log.warn('Host closed the connection; asking the editor to exit');
        editor.terminate();
    }

    /** Send the working copy if it differs from the last content the host has. */
    private async syncChanges(workspace: Workspace, session: SessionState): Promise<void> {
        if (this.hostClosed) return;

        const content = await workspace.read();
        // The host may have hung up while the working copy was being read.
        if (this.hostClosed) return;
        if (content.equals(session.baseContent)) {
            this.log.debug('No changes to send');
            return;
        }

        const payload =
            this.mode === 'full'
                ? fullUpdate(content)
                : differentialUpdate(session.baseContent, content, session.filename);

        const sending = this.state === ClientSessionState.EDITING;
        if (sending) this.transition(ClientSessionState.SENDING_UPDATE);

        const { headers, body } = buildUpdateFrame(payload);
        const bytes = await writeFrame(this.socket, headers, body);

        session.baseContent = content;
        session.lastAppliedFilesize = content.length;
        session.lastChecksum = digest(content);
        this.updatesSent++;

        this.log.info(`Sent ${payload.kind} update`, { filesize: content.length, bytes });
        this.emit('sent', { kind: payload.kind, filesize: content.length, bytes });

        if (sending && this.state === ClientSessionState.SENDING_UPDATE) {
            this.transition(ClientSessionState.EDITING);
        }
    }

    private finish(reason: ClientCloseReason): ClientSessionSummary {
        if (this.state !== ClientSessionState.CLOSED) {
            this.transition(ClientSessionState.CLOSED);
            this.reader.detach();
            if (!this.socket.destroyed) this.socket.end();
            this.log.debug(`Session closed (${reason})`);
        }
        return {
            filename: this.session?.filename ?? '',
            updatesSent: this.updatesSent,
            closeReason: reason,
        };
    }

    private transition(next: ClientSessionState): void {
        if (this.state === next) return;
        if (!TRANSITIONS[this.state].includes(next)) {
            throw new Error(`Invalid state transition: ${this.state} → ${next}`);
        }
        this.state = next;
        this.emit('state', next);
    }
}
