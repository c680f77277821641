// ─── Tunnedit Client: Workspace ──────────────────────────────────────────────

import fs from 'fs';
import os from 'os';
import path from 'path';

const DIR_MODE = 0o700;
const FILE_MODE = 0o600;
const DEFAULT_NAME = 'file';

/**
 * Reduce a name received from the host to a plain file name, so it can never
 * point outside the workspace.
 */
export function safeFileName(filename: string): string {
    const base = path.basename(filename.replace(/\\/g, '/'));
    return base === '' || base === '.' || base === '..' ? DEFAULT_NAME : base;
}

/** Private temporary directory holding the working copy the editor opens. */
export class Workspace {
    private constructor(
        readonly dir: string,
        readonly filePath: string,
    ) {}

    static async create(filename: string, content: Buffer, root: string = os.tmpdir()): Promise<Workspace> {
        const dir = await fs.promises.mkdtemp(path.join(root, 'tunnedit-edit-'));
        await fs.promises.chmod(dir, DIR_MODE);
        const filePath = path.join(dir, safeFileName(filename));
        await fs.promises.writeFile(filePath, content, { mode: FILE_MODE });
        await fs.promises.chmod(filePath, FILE_MODE);
        return new Workspace(dir, filePath);
    }

    read(): Promise<Buffer> {
        return fs.promises.readFile(this.filePath);
    }

    async dispose(): Promise<void> {
        await fs.promises.rm(this.dir, { recursive: true, force: true });
    }
}
