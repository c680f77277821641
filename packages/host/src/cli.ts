#!/usr/bin/env tsx
// ─── Tunnedit Host: Entry Point ──────────────────────────────────────────────

import { Command, Option } from 'commander';
import chalk from 'chalk';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
    MAX_HEADER_BLOCK_SIZE,
    SOCKET_ENV_VAR,
    SOCKET_FILE_NAME,
    VERSION,
    createLogger,
    setLogLevel,
} from '@tunnedit/shared';
import { config } from './config';
import { HostServer } from './server';
import { exportCommand } from './shellExport';

/** Files created from here on are readable by their owner only. */
const USER_ONLY_UMASK = 0o177;

const log = createLogger('Host');

interface HostCliOptions {
    socketAddress?: string;
    shell?: string;
    bash?: boolean;
    csh?: boolean;
    fish?: boolean;
    debug?: boolean;
}

function chooseShell(opts: HostCliOptions): string {
    if (opts.shell) return opts.shell;
    if (opts.bash) return 'bash';
    if (opts.csh) return 'csh';
    if (opts.fish) return 'fish';
    return config.shell;
}

async function checkFiles(files: string[]): Promise<boolean> {
    let ok = true;
    for (const file of files) {
        try {
            await fs.promises.access(file, fs.constants.R_OK | fs.constants.W_OK);
        } catch (err) {
            log.error(`Cannot share ${file}: ${err instanceof Error ? err.message : String(err)}`);
            ok = false;
        }
    }
    return ok;
}

async function main(files: string[], opts: HostCliOptions): Promise<number> {
    if (opts.debug || config.debug) setLogLevel('debug');
    if (!(await checkFiles(files))) return 1;

    process.umask(USER_ONLY_UMASK);

    // Without an explicit address, export a private directory; clients look for the socket inside it.
    let socketDir: string | null = null;
    let exported: string;
    let socketPath: string;
    if (opts.socketAddress) {
        socketPath = path.resolve(opts.socketAddress);
        exported = socketPath;
    } else {
        socketDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'tunnedit-'));
        socketPath = path.join(socketDir, SOCKET_FILE_NAME);
        exported = socketDir;
    }

    const server = new HostServer({
        socketPath,
        limits: { maxBodySize: config.maxBodySize, maxHeaderSize: MAX_HEADER_BLOCK_SIZE },
    });

    const shutdown = () => {
        console.error('');
        console.error(chalk.yellow('  Shutting down...'));
        server.stop().catch((err: unknown) => {
            log.error(`Failed to stop cleanly: ${err instanceof Error ? err.message : String(err)}`);
        });
    };

    try {
        await server.start();

        console.error(chalk.bold.blue(`  Tunnedit host v${VERSION}`));
        console.error(chalk.gray(`  Socket: ${socketPath}`));
        console.error(chalk.gray('  Run this in the shell where the client will be started:'));
        console.log(exportCommand(SOCKET_ENV_VAR, exported, chooseShell(opts)));

        process.on('SIGINT', shutdown);
        process.on('SIGTERM', shutdown);

        const results = await Promise.allSettled(files.map((file) => server.share(file)));
        const failed = results.filter((result) => result.status === 'rejected').length;
        await server.stop();
        return failed > 0 ? 1 : 0;
    } finally {
        process.off('SIGINT', shutdown);
        process.off('SIGTERM', shutdown);
        if (socketDir) {
            await fs.promises.rm(socketDir, { recursive: true, force: true });
        }
    }
}

const program = new Command();

program
    .name('tunnedit-host')
    .description('Share files with a tunnedit client over a UNIX socket')
    .version(VERSION)
    .argument('<files...>', 'Files to offer for editing, one client each')
    .option('-a, --socket-address <path>', 'Create the socket at this path instead of a private temporary directory')
    .addOption(new Option('--shell <name>', 'Shell syntax for the printed export line').conflicts(['bash', 'csh', 'fish']))
    .addOption(new Option('-b, --bash', 'Shortcut for --shell bash').conflicts(['csh', 'fish']))
    .addOption(new Option('-c, --csh', 'Shortcut for --shell csh').conflicts(['fish']))
    .option('--fish', 'Shortcut for --shell fish')
    .option('-d, --debug', 'Log debug output')
    .action(async (files: string[], opts: HostCliOptions) => {
        try {
            process.exitCode = await main(files, opts);
        } catch (err) {
            log.error(err instanceof Error ? err.message : String(err));
            process.exitCode = 1;
        }
    });

program.parseAsync().catch((err: unknown) => {
    log.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
});
