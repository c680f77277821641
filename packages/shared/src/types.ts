// ─── Shared Types for Tunnedit ───────────────────────────────────────────────

/** Ordered header mapping; names are unique by construction. */
export type FrameHeaders = Map<string, string>;

export interface Frame {
    headers: FrameHeaders;
    body: Buffer;
}

export type SessionRole = 'host' | 'client';

export type UpdateMode = 'differential' | 'full';

export type UpdatePayload =
    | { kind: 'full'; content: Buffer }
    | { kind: 'differential'; diff: Buffer; resultingFilesize: number; resultingChecksum: string };

/**
 * Per-connection state. Each side owns one of these; nothing in it is shared
 * with the peer except through frames.
 */
export interface SessionState {
    role: SessionRole;
    protocolVersion: number;
    filename: string;
    /** Last content both sides are known to agree on. Diffs are relative to it. */
    baseContent: Buffer;
    lastAppliedFilesize: number;
    lastChecksum: string;
}

export interface FrameReaderStats {
    bytesReceived: number;
    framesRead: number;
}

export interface FrameLimits {
    maxBodySize: number;
    maxHeaderSize: number;
}
