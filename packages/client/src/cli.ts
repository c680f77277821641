#!/usr/bin/env tsx
// ─── Tunnedit Client: Entry Point ────────────────────────────────────────────

import { Command } from 'commander';
import chalk from 'chalk';
import {
    MAX_HEADER_BLOCK_SIZE,
    VERSION,
    createLogger,
    setLogLevel,
    type UpdateMode,
} from '@tunnedit/shared';
import { connectToHost } from './client';
import { ClientSession } from './clientSession';
import { config } from './config';
import { ExternalEditorLauncher, chooseEditor, isGraphicalSession } from './editor';
import { findSocket } from './socketPath';

const log = createLogger('Client');

interface ClientCliOptions {
    socketAddress?: string;
    full?: boolean;
    editor?: string;
    debug?: boolean;
}

async function main(opts: ClientCliOptions): Promise<number> {
    if (opts.debug || config.debug) setLogLevel('debug');

    const socketPath = await findSocket(opts.socketAddress);
    if (!socketPath) return 1;

    const command = opts.editor ? opts.editor.trim().split(/\s+/) : chooseEditor(process.env);
    if (!command || command[0] === '') {
        log.error('No editor found; set EDITOR or pass --editor');
        return 1;
    }
    if (!isGraphicalSession(process.env)) {
        log.warn('No graphical session detected; the editor may not be able to open a window');
    }

    const mode: UpdateMode = opts.full ? 'full' : config.updateMode;
    const socket = await connectToHost(socketPath);
    const session = new ClientSession(socket, {
        launcher: new ExternalEditorLauncher(command),
        mode,
        limits: { maxBodySize: config.maxBodySize, maxHeaderSize: MAX_HEADER_BLOCK_SIZE },
    });
    session.on('opened', (filePath) => console.error(chalk.gray(`  Editing ${filePath} with ${command.join(' ')}`)));

    const summary = await session.run();
    if (summary.closeReason === 'host-closed') {
        log.warn(`Host closed ${summary.filename} before the editor exited`);
        return 1;
    }
    log.success(`Done editing ${summary.filename}`, { updates: summary.updatesSent });
    return 0;
}

const program = new Command();

program
    .name('tunnedit-edit')
    .description('Edit a file shared by tunnedit-host in a local editor')
    .version(VERSION)
    .option('-a, --socket-address <path>', 'Socket (or directory holding it) to connect to')
    .option('--full', 'Send the whole file on every save instead of a diff')
    .option('-e, --editor <command>', 'Editor command to run')
    .option('-d, --debug', 'Log debug output')
    .action(async (opts: ClientCliOptions) => {
        try {
            process.exitCode = await main(opts);
        } catch (err) {
            log.error(err instanceof Error ? err.message : String(err));
            process.exitCode = 1;
        }
    });

program.parseAsync().catch((err: unknown) => {
    log.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
});
