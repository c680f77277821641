// ─── Tunnedit Host: Share Registry ───────────────────────────────────────────

import path from 'path';
import { TunneditError } from '@tunnedit/shared';
import type { FileStore } from './fileStore';

export type ShareStatus = 'pending' | 'active';

export interface Share {
    /** Absolute path of the shared file. */
    path: string;
    store: FileStore;
    status: ShareStatus;
    since: number;
}

export interface ShareInfo {
    path: string;
    status: ShareStatus;
    since: number;
}

/** The path is already waiting for, or being edited by, another client. */
export class ShareInUseError extends TunneditError {
    readonly path: string;

    constructor(filePath: string) {
        super(`${filePath} is already being shared`);
        this.name = 'ShareInUseError';
        this.path = filePath;
    }
}

/**
 * Tracks which files a host is offering. Each accepted connection claims the
 * oldest pending share; a path is owned by at most one share at a time.
 */
export class ShareRegistry {
    private readonly pending: Share[] = [];
    private readonly active = new Map<string, Share>();

    add(filePath: string, store: FileStore): Share {
        const resolved = path.resolve(filePath);
        if (this.has(resolved)) {
            throw new ShareInUseError(resolved);
        }
        const share: Share = { path: resolved, store, status: 'pending', since: Date.now() };
        this.pending.push(share);
        return share;
    }

    /** Move the oldest pending share to active, or undefined when none is waiting. */
    claimNext(): Share | undefined {
        const share = this.pending.shift();
        if (!share) return undefined;
        share.status = 'active';
        share.since = Date.now();
        this.active.set(share.path, share);
        return share;
    }

    release(share: Share): boolean {
        const index = this.pending.indexOf(share);
        if (index !== -1) {
            this.pending.splice(index, 1);
            return true;
        }
        if (this.active.get(share.path) !== share) return false;
        this.active.delete(share.path);
        return true;
    }

    /** Drop every share that no client has claimed yet. */
    releasePending(): Share[] {
        return this.pending.splice(0, this.pending.length);
    }

    has(filePath: string): boolean {
        const resolved = path.resolve(filePath);
        return this.active.has(resolved) || this.pending.some((share) => share.path === resolved);
    }

    get size(): number {
        return this.pending.length + this.active.size;
    }

    list(): ShareInfo[] {
        return [...this.pending, ...this.active.values()].map(({ path: sharePath, status, since }) => ({
            path: sharePath,
            status,
            since,
        }));
    }
}
