// ─── Tunnedit Client: Connection ─────────────────────────────────────────────

import { createConnection, type Socket } from 'net';
import { createLogger } from '@tunnedit/shared';

const log = createLogger('Client');

/** Connect to a host's UNIX socket. */
export function connectToHost(socketPath: string): Promise<Socket> {
    return new Promise((resolve, reject) => {
        const socket = createConnection(socketPath);
        const onError = (err: Error) => {
            socket.destroy();
            reject(err);
        };
        socket.once('error', onError);
        socket.once('connect', () => {
            socket.off('error', onError);
            socket.on('error', (err) => log.debug(`Socket error: ${err.message}`));
            log.debug(`Connected to ${socketPath}`);
            resolve(socket);
        });
    });
}
