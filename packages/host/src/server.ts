// ─── Tunnedit Host: Socket Server ────────────────────────────────────────────

import { EventEmitter } from 'events';
import fs from 'fs';
import { createServer, type Server, type Socket } from 'net';
import path from 'path';
import {
    ConnectionClosedError,
    DEFAULT_FRAME_LIMITS,
    createLogger,
    type FrameLimits,
} from '@tunnedit/shared';
import { LocalFileStore, type FileStore } from './fileStore';
import { HostSession, type HostSessionSummary } from './hostSession';
import { ShareRegistry, type Share } from './shareRegistry';

const log = createLogger('Host');

/** Owner read/write only. */
export const SOCKET_MODE = 0o600;

export interface HostServerOptions {
    socketPath: string;
    limits?: FrameLimits;
    openStore?: (filePath: string) => FileStore;
}

interface ShareOutcome {
    resolve: (summary: HostSessionSummary) => void;
    reject: (err: unknown) => void;
}

export interface HostServerEvents {
    session: (session: HostSession) => void;
}

export interface HostServer {
    on<E extends keyof HostServerEvents>(event: E, listener: HostServerEvents[E]): this;
    emit<E extends keyof HostServerEvents>(event: E, ...args: Parameters<HostServerEvents[E]>): boolean;
}

/**
 * Listens on a UNIX socket and serves shared files, one connection per file.
 *
 * Each accepted connection claims the oldest pending share. A connection that
 * arrives while nothing is pending is closed straight away.
 */
export class HostServer extends EventEmitter {
    private readonly server: Server;
    private readonly registry = new ShareRegistry();
    private readonly outcomes = new Map<Share, ShareOutcome>();
    private readonly sessions = new Set<HostSession>();
    private readonly limits: FrameLimits;
    private readonly openStore: (filePath: string) => FileStore;
    private stopping: Promise<void> | null = null;

    constructor(private readonly options: HostServerOptions) {
        super();
        this.limits = options.limits ?? DEFAULT_FRAME_LIMITS;
        this.openStore = options.openStore ?? ((filePath) => new LocalFileStore(filePath));
        this.server = createServer((socket) => this.handleSocket(socket));
    }

    get socketPath(): string {
        return this.options.socketPath;
    }

    /**
     * Start listening. The socket is restricted to its owner before this resolves.
     */
    async start(): Promise<void> {
        await new Promise<void>((resolve, reject) => {
            this.server.once('error', reject);
            this.server.listen(this.options.socketPath, () => {
                this.server.off('error', reject);
                resolve();
            });
        });
        await fs.promises.chmod(this.options.socketPath, SOCKET_MODE);
        this.server.on('error', (err) => log.error(`Socket server error: ${err.message}`));
        log.debug(`Listening on ${this.options.socketPath}`);
    }

    /**
     * Offer a file to the next client that connects.
     *
     * @returns a promise for the session summary, settled once that client is done
     * @throws ShareInUseError (as a rejection) if the path is already shared
     */
    share(filePath: string): Promise<HostSessionSummary> {
        return new Promise((resolve, reject) => {
            const resolved = path.resolve(filePath);
            const share = this.registry.add(resolved, this.openStore(resolved));
            this.outcomes.set(share, { resolve, reject });
            log.info(`Waiting for a client to edit ${resolved}`);
        });
    }

    /**
     * Stop accepting connections, drop active sessions and fail pending shares.
     * Safe to call more than once.
     */
    stop(): Promise<void> {
        if (!this.stopping) {
            this.stopping = this.shutdown();
        }
        return this.stopping;
    }

    private async shutdown(): Promise<void> {
        for (const share of this.registry.releasePending()) {
            this.outcomes.get(share)?.reject(new ConnectionClosedError(`Stopped before a client opened ${share.path}`));
            this.outcomes.delete(share);
        }
        for (const session of this.sessions) {
            session.abort();
        }
        if (!this.server.listening) return;

        await new Promise<void>((resolve, reject) => {
            this.server.close((err) => (err ? reject(err) : resolve()));
        });
        log.debug('Socket server stopped');
    }

    protected handleSocket(socket: Socket): void {
        // Stays attached for the socket's whole life, including the gaps before
        // a session reads from it and after the session lets go of it.
        socket.on('error', (err) => log.debug(`Connection error: ${err.message}`));

        const share = this.registry.claimNext();
        if (!share) {
            log.warn('Connection arrived with no file waiting to be shared; closing it');
            socket.destroy();
            return;
        }
        void this.serve(share, socket);
    }

    /** Run one share's session to completion. Never rejects; the outcome goes to `share()`. */
    private async serve(share: Share, socket: Socket): Promise<void> {
        const outcome = this.outcomes.get(share);
        this.outcomes.delete(share);
        const filename = path.basename(share.path);

        try {
            const content = await share.store.read();
            const session = new HostSession(socket, {
                filename,
                content,
                store: share.store,
                limits: this.limits,
                logger: log.child(filename),
            });
            this.sessions.add(session);
            this.emit('session', session);
            log.info(`Client connected for ${share.path}`);

            try {
                const summary = await session.run();
                log.success(`Finished editing ${share.path}`, {
                    applied: summary.updatesApplied,
                    rejected: summary.updatesRejected,
                    reason: summary.closeReason,
                });
                outcome?.resolve(summary);
            } finally {
                this.sessions.delete(session);
            }
        } catch (err) {
            socket.destroy();
            log.error(`Session for ${share.path} failed: ${err instanceof Error ? err.message : String(err)}`);
            outcome?.reject(err);
        } finally {
            this.registry.release(share);
        }
    }
}
