// ─── Tunnedit Host: Host Session ─────────────────────────────────────────────

import { EventEmitter } from 'events';
import type { Duplex } from 'stream';
import {
    ChecksumMismatchError,
    DEFAULT_FRAME_LIMITS,
    FrameReader,
    IncompleteFrameError,
    PROTOCOL_VERSION,
    SizeMismatchError,
    applyDiff,
    buildInitialFrame,
    createLogger,
    digest,
    isUpdateRejection,
    readUpdatePayload,
    verify,
    writeFrame,
    type Frame,
    type FrameLimits,
    type Logger,
    type SessionState,
    type UpdatePayload,
    type UpdateRejection,
} from '@tunnedit/shared';
import type { FileStore } from './fileStore';

export enum HostSessionState {
    IDLE = 'Idle',
    CONNECTED = 'Connected',
    AWAITING_UPDATE = 'AwaitingUpdate',
    APPLYING = 'Applying',
    CLOSED = 'Closed',
}

export type HostCloseReason = 'peer-closed' | 'incomplete-frame' | 'transport-error' | 'aborted' | 'failed';

export interface AppliedUpdate {
    kind: UpdatePayload['kind'];
    filesize: number;
    checksum: string;
}

export interface HostSessionSummary {
    filename: string;
    updatesApplied: number;
    updatesRejected: number;
    bytesReceived: number;
    closeReason: HostCloseReason;
}

export interface HostSessionEvents {
    state: (state: HostSessionState) => void;
    applied: (update: AppliedUpdate) => void;
    rejected: (error: UpdateRejection) => void;
}

export interface HostSessionOptions {
    filename: string;
    content: Buffer;
    store: FileStore;
    limits?: FrameLimits;
    logger?: Logger;
}

const TRANSITIONS: Record<HostSessionState, HostSessionState[]> = {
    [HostSessionState.IDLE]: [HostSessionState.CONNECTED, HostSessionState.CLOSED],
    [HostSessionState.CONNECTED]: [HostSessionState.AWAITING_UPDATE, HostSessionState.CLOSED],
    [HostSessionState.AWAITING_UPDATE]: [HostSessionState.APPLYING, HostSessionState.CLOSED],
    [HostSessionState.APPLYING]: [HostSessionState.AWAITING_UPDATE, HostSessionState.CLOSED],
    [HostSessionState.CLOSED]: [],
};

export interface HostSession {
    on<E extends keyof HostSessionEvents>(event: E, listener: HostSessionEvents[E]): this;
    once<E extends keyof HostSessionEvents>(event: E, listener: HostSessionEvents[E]): this;
    emit<E extends keyof HostSessionEvents>(event: E, ...args: Parameters<HostSessionEvents[E]>): boolean;
}

/**
 * Serves one shared file to one connected client.
 *
 * Sends the initial frame, then applies full or differential updates in the
 * order they arrive. Only updates that apply cleanly and pass the size and
 * checksum checks reach the file store; a rejected update leaves the baseline
 * untouched and the session keeps going. Malformed frames end the session and
 * reject `run()`.
 */
export class HostSession extends EventEmitter {
    private state: HostSessionState = HostSessionState.IDLE;
    private readonly session: SessionState;
    private readonly reader: FrameReader;
    private readonly store: FileStore;
    private readonly log: Logger;
    private updatesApplied = 0;
    private updatesRejected = 0;
    private aborted = false;

    constructor(
        private readonly socket: Duplex,
        options: HostSessionOptions,
    ) {
        super();
        this.store = options.store;
        this.log = options.logger ?? createLogger('Host');
        this.reader = new FrameReader(socket, options.limits ?? DEFAULT_FRAME_LIMITS);
        this.session = {
            role: 'host',
            protocolVersion: PROTOCOL_VERSION,
            filename: options.filename,
            baseContent: options.content,
            lastAppliedFilesize: options.content.length,
            lastChecksum: digest(options.content),
        };
    }

    /**
     * Drive the session until the client disconnects.
     *
     * @throws ProtocolError when the client sends a malformed frame
     */
    async run(): Promise<HostSessionSummary> {
        if (this.state !== HostSessionState.IDLE) {
            throw new Error('HostSession.run() may only be called once');
        }
        this.transition(HostSessionState.CONNECTED);

        try {
            const initial = buildInitialFrame(this.session.filename, this.session.baseContent);
            await writeFrame(this.socket, initial.headers, initial.body);
            this.log.debug(`Sent ${this.session.filename}`, { filesize: this.session.lastAppliedFilesize });
            this.transition(HostSessionState.AWAITING_UPDATE);

            for (;;) {
                const frame = await this.nextFrame();
                if (frame === 'incomplete') return this.finish(this.aborted ? 'aborted' : 'incomplete-frame');
                if (!frame) return this.finish(this.endReason());

                this.transition(HostSessionState.APPLYING);
                await this.handleUpdate(frame);
                this.transition(HostSessionState.AWAITING_UPDATE);
            }
        } catch (err) {
            this.socket.destroy();
            this.finish('failed');
            throw err;
        }
    }

    /** Drop the connection. `run()` resolves with reason `aborted`. */
    abort(): void {
        if (this.state === HostSessionState.CLOSED) return;
        this.aborted = true;
        this.socket.destroy();
    }

    getState(): HostSessionState {
        return this.state;
    }

    get filename(): string {
        return this.session.filename;
    }

    /** Content both sides currently agree on. */
    get baseContent(): Buffer {
        return this.session.baseContent;
    }

    private async nextFrame(): Promise<Frame | null | 'incomplete'> {
        try {
            return await this.reader.next();
        } catch (err) {
            if (!(err instanceof IncompleteFrameError)) throw err;
            this.log.warn(`Connection closed mid-frame; discarded ${err.bytesBuffered} bytes`);
            return 'incomplete';
        }
    }

    private endReason(): HostCloseReason {
        if (this.aborted) return 'aborted';
        return this.reader.transportError ? 'transport-error' : 'peer-closed';
    }

    private async handleUpdate(frame: Frame): Promise<void> {
        let payload: UpdatePayload;
        let content: Buffer;
        try {
            payload = readUpdatePayload(frame);
            content = this.resolveContent(payload);
        } catch (err) {
            if (!isUpdateRejection(err)) throw err;
            this.updatesRejected++;
            this.log.warn(`Update rejected, keeping previous content: ${err.message}`);
            this.emit('rejected', err);
            return;
        }

        await this.store.write(content);

        this.session.baseContent = content;
        this.session.lastAppliedFilesize = content.length;
        this.session.lastChecksum = digest(content);
        this.updatesApplied++;

        this.log.info(`Applied ${payload.kind} update to ${this.session.filename}`, { filesize: content.length });
        this.emit('applied', {
            kind: payload.kind,
            filesize: content.length,
            checksum: this.session.lastChecksum,
        });
    }

    private resolveContent(payload: UpdatePayload): Buffer {
        if (payload.kind === 'full') return payload.content;

        const result = applyDiff(this.session.baseContent, payload.diff);
        if (result.length !== payload.resultingFilesize) {
            throw new SizeMismatchError(payload.resultingFilesize, result.length);
        }
        if (!verify(result, payload.resultingChecksum)) {
            throw new ChecksumMismatchError(payload.resultingChecksum.toLowerCase(), digest(result));
        }
        return result;
    }

    private finish(reason: HostCloseReason): HostSessionSummary {
        if (this.state !== HostSessionState.CLOSED) {
            this.transition(HostSessionState.CLOSED);
            this.reader.detach();
            if (!this.socket.destroyed) this.socket.end();
            this.log.debug(`Session closed (${reason})`);
        }
        return {
            filename: this.session.filename,
            updatesApplied: this.updatesApplied,
            updatesRejected: this.updatesRejected,
            bytesReceived: this.reader.getStats().bytesReceived,
            closeReason: reason,
        };
    }

    private transition(next: HostSessionState): void {
        if (this.state === next) return;
        if (!TRANSITIONS[this.state].includes(next)) {
            throw new Error(`Invalid state transition: ${this.state} → ${next}`);
        }
        this.state = next;
        this.emit('state', next);
    }
}
