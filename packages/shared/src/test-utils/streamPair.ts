import { Duplex } from 'stream';

/**
 * One end of an in-process socket pair. Bytes written to one end are read
 * from the other; ending or destroying one end ends the peer's readable side.
 */
export class PipeEnd extends Duplex {
    private peer: PipeEnd | null = null;
    private readableClosed = false;
    readonly written: Buffer[] = [];

    connect(peer: PipeEnd): void {
        this.peer = peer;
    }

    override _read(): void {}

    override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
        this.written.push(chunk);
        this.peer?.deliver(chunk);
        callback();
    }

    override _final(callback: (error?: Error | null) => void): void {
        this.peer?.finishReadable();
        callback();
    }

    override _destroy(error: Error | null, callback: (error?: Error | null) => void): void {
        this.peer?.finishReadable();
        callback(error);
    }

    /** Everything this end has written so far. */
    writtenBytes(): Buffer {
        return Buffer.concat(this.written);
    }

    private deliver(chunk: Buffer): void {
        if (!this.readableClosed) this.push(chunk);
    }

    private finishReadable(): void {
        if (this.readableClosed) return;
        this.readableClosed = true;
        this.push(null);
    }
}

export function createStreamPair(): [PipeEnd, PipeEnd] {
    const a = new PipeEnd();
    const b = new PipeEnd();
    a.connect(b);
    b.connect(a);
    return [a, b];
}
