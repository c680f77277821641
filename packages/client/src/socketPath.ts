// ─── Tunnedit Client: Socket Discovery ───────────────────────────────────────

import fs, { type Stats } from 'fs';
import path from 'path';
import { SOCKET_ENV_VAR, SOCKET_FILE_NAME, createLogger, type Logger } from '@tunnedit/shared';

const USER_ONLY_MODE = 0o600;

async function statOrNull(target: string): Promise<Stats | null> {
    try {
        return await fs.promises.stat(target);
    } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
        throw err;
    }
}

/**
 * Resolve the socket to connect to, from `address` or the environment.
 *
 * A directory stands for the socket file inside it. The socket must belong
 * to the current user and allow no one else in.
 *
 * @returns the socket path, or null (with the reason logged) when unusable
 */
export async function findSocket(
    address?: string,
    env: NodeJS.ProcessEnv = process.env,
    log: Logger = createLogger('Client'),
): Promise<string | null> {
    let socketPath = address || env[SOCKET_ENV_VAR];
    if (!socketPath) {
        log.error(`No ${SOCKET_ENV_VAR} environment variable and no socket address given`);
        return null;
    }

    let stats = await statOrNull(socketPath);
    if (!stats) {
        log.error(`Socket address ${socketPath} does not exist`);
        return null;
    }

    if (stats.isDirectory()) {
        const inner = path.join(socketPath, SOCKET_FILE_NAME);
        stats = await statOrNull(inner);
        if (!stats) {
            log.error(`Socket directory ${socketPath} does not contain a socket`);
            return null;
        }
        socketPath = inner;
    }

    if (!stats.isSocket()) {
        log.error(`${socketPath} is not a socket`);
        return null;
    }

    const uid = process.getuid?.();
    if (uid !== undefined && stats.uid !== uid) {
        log.error(`Socket ${socketPath} is not owned by the current user`);
        return null;
    }

    if ((stats.mode & 0o777) !== USER_ONLY_MODE) {
        log.error(`Socket ${socketPath} is accessible to other users (mode ${(stats.mode & 0o777).toString(8)})`);
        return null;
    }

    log.debug(`Socket found: ${socketPath}`);
    return socketPath;
}
