// ─── Tunnedit: Frame Reader / Writer ─────────────────────────────────────────

import type { Readable, Writable } from 'stream';
import { ConnectionClosedError, IncompleteFrameError } from './errors';
import { DEFAULT_FRAME_LIMITS, encodeFrame, extractFrame, type HeaderInput } from './frame';
import type { Frame, FrameLimits, FrameReaderStats } from './types';

/**
 * Pull-based frame reader over a byte stream.
 *
 * Bytes are buffered as they arrive and frames are handed out one at a time
 * through `next()`, which is the only place a session ever waits. Frames
 * split across chunks, or several frames in one chunk, come out the same.
 *
 * A stream that ends on a frame boundary yields `null`. One that ends inside
 * a frame throws IncompleteFrameError and the partial bytes are dropped.
 * Transport errors count as the stream ending; see `transportError`.
 */
export class FrameReader {
    private recvBuffer: Buffer = Buffer.alloc(0);
    private ended = false;
    private waiter: (() => void) | null = null;
    private bytesReceived = 0;
    private framesRead = 0;
    private lastTransportError: Error | null = null;

    constructor(
        private readonly stream: Readable,
        private readonly limits: FrameLimits = DEFAULT_FRAME_LIMITS,
    ) {
        if (stream.readableEnded || stream.destroyed) {
            this.ended = true;
        }
        stream.on('data', this.onData);
        stream.on('end', this.onEnd);
        stream.on('close', this.onEnd);
        stream.on('error', this.onError);
    }

    /**
     * Resolve with the next complete frame, or null on a clean close.
     *
     * @throws ProtocolError if the header block is malformed
     * @throws IncompleteFrameError if the stream ends mid-frame
     */
    async next(): Promise<Frame | null> {
        for (;;) {
            const result = extractFrame(this.recvBuffer, this.limits);
            if (result) {
                this.recvBuffer = result.remaining;
                this.framesRead++;
                return result.frame;
            }

            if (this.ended) {
                const buffered = this.recvBuffer.length;
                if (buffered === 0) return null;
                this.recvBuffer = Buffer.alloc(0);
                throw new IncompleteFrameError(
                    `Stream closed with ${buffered} bytes of an incomplete frame`,
                    buffered,
                );
            }

            await new Promise<void>((resolve) => {
                this.waiter = resolve;
            });
        }
    }

    /** Whether the underlying stream has finished delivering data. */
    isEnded(): boolean {
        return this.ended;
    }

    get transportError(): Error | null {
        return this.lastTransportError;
    }

    getStats(): FrameReaderStats {
        return { bytesReceived: this.bytesReceived, framesRead: this.framesRead };
    }

    /** Stop listening to the stream. Pending reads see a closed stream. */
    detach(): void {
        this.stream.off('data', this.onData);
        this.stream.off('end', this.onEnd);
        this.stream.off('close', this.onEnd);
        this.stream.off('error', this.onError);
        this.onEnd();
    }

    private readonly onData = (chunk: Buffer | string): void => {
        const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
        this.bytesReceived += bytes.length;
        this.recvBuffer = this.recvBuffer.length === 0 ? bytes : Buffer.concat([this.recvBuffer, bytes]);
        this.wake();
    };

    private readonly onEnd = (): void => {
        this.ended = true;
        this.wake();
    };

    private readonly onError = (err: Error): void => {
        this.lastTransportError = err;
        this.onEnd();
    };

    private wake(): void {
        const waiter = this.waiter;
        this.waiter = null;
        waiter?.();
    }
}

/**
 * Encode and write one frame.
 *
 * @returns the number of bytes written, once the stream has accepted them
 */
export function writeFrame(stream: Writable, headers: HeaderInput, body?: Buffer): Promise<number> {
    const buffer = encodeFrame(headers, body);
    return new Promise((resolve, reject) => {
        if (stream.destroyed || stream.writableEnded) {
            reject(new ConnectionClosedError());
            return;
        }
        stream.write(buffer, (err) => {
            if (err) {
                reject(err);
            } else {
                resolve(buffer.length);
            }
        });
    });
}
