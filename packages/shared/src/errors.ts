// ─── Tunnedit Error Classes ──────────────────────────────────────────────────

export class TunneditError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'TunneditError';
    }
}

/** Malformed frame syntax. Fatal for the session that saw it. */
export class ProtocolError extends TunneditError {
    constructor(message: string) {
        super(message);
        this.name = 'ProtocolError';
    }
}

/** The stream ended part-way through a frame. */
export class IncompleteFrameError extends TunneditError {
    readonly bytesBuffered: number;

    constructor(message: string, bytesBuffered: number) {
        super(message);
        this.name = 'IncompleteFrameError';
        this.bytesBuffered = bytesBuffered;
    }
}

export class UnsupportedVersionError extends TunneditError {
    readonly version: string;

    constructor(version: string) {
        super(`Unsupported protocol version: ${version}`);
        this.name = 'UnsupportedVersionError';
        this.version = version;
    }
}

/** A patch did not match the content it was applied to. */
export class DiffApplicationError extends TunneditError {
    constructor(message: string) {
        super(message);
        this.name = 'DiffApplicationError';
    }
}

export class ChecksumMismatchError extends TunneditError {
    readonly expected: string;
    readonly actual: string;

    constructor(expected: string, actual: string) {
        super(`Checksum mismatch: expected ${expected}, got ${actual}`);
        this.name = 'ChecksumMismatchError';
        this.expected = expected;
        this.actual = actual;
    }
}

export class SizeMismatchError extends TunneditError {
    readonly expected: number;
    readonly actual: number;

    constructor(expected: number, actual: number) {
        super(`Size mismatch: expected ${expected} bytes, got ${actual}`);
        this.name = 'SizeMismatchError';
        this.expected = expected;
        this.actual = actual;
    }
}

/** Errors that reject a single update without ending the session. */
export type UpdateRejection = DiffApplicationError | ChecksumMismatchError | SizeMismatchError;

export function isUpdateRejection(err: unknown): err is UpdateRejection {
    return (
        err instanceof DiffApplicationError ||
        err instanceof ChecksumMismatchError ||
        err instanceof SizeMismatchError
    );
}

/** A write was attempted on a connection that is already closed. */
export class ConnectionClosedError extends TunneditError {
    constructor(message = 'Connection is closed') {
        super(message);
        this.name = 'ConnectionClosedError';
    }
}
