// ─── Tunnedit Host: File Store ───────────────────────────────────────────────

import crypto from 'crypto';
import fs from 'fs';
import path from 'path';

/** Where a host session reads the shared file from and writes updates to. */
export interface FileStore {
    readonly path: string;
    read(): Promise<Buffer>;
    /** Replace the content atomically; readers see the old or the new file, never a mix. */
    write(content: Buffer): Promise<void>;
}

function isMissingFile(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class LocalFileStore implements FileStore {
    constructor(readonly path: string) {}

    read(): Promise<Buffer> {
        return fs.promises.readFile(this.path);
    }

    async write(content: Buffer): Promise<void> {
        const mode = await this.currentMode();
        const tmp = path.join(
            path.dirname(this.path),
            `.${path.basename(this.path)}.${crypto.randomBytes(6).toString('hex')}.tmp`,
        );

        try {
            await fs.promises.writeFile(tmp, content, { flag: 'wx' });
            if (mode !== null) await fs.promises.chmod(tmp, mode);
            await fs.promises.rename(tmp, this.path);
        } catch (err) {
            await fs.promises.rm(tmp, { force: true });
            throw err;
        }
    }

    private async currentMode(): Promise<number | null> {
        try {
            return (await fs.promises.stat(this.path)).mode & 0o7777;
        } catch (err) {
            if (isMissingFile(err)) return null;
            throw err;
        }
    }
}
