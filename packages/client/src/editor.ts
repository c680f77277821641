// ─── Tunnedit Client: External Editor ────────────────────────────────────────

import { spawn, type ChildProcess } from 'child_process';
import { watch, type FSWatcher } from 'chokidar';
import { EventEmitter } from 'events';
import fs from 'fs';
import path from 'path';
import { SAVE_DEBOUNCE_MS, createLogger } from '@tunnedit/shared';

const log = createLogger('Editor');

/** Fallback editors, most preferred first, looked up on PATH. */
export const FALLBACK_EDITORS = ['sensible-editor', 'xdg-open', 'nano', 'ed'] as const;

const EDITOR_VARIABLES = ['EDITOR', 'VISUAL', 'SUDO_EDITOR'] as const;
const GRAPHICAL_VARIABLES = ['DISPLAY', 'WAYLAND_DISPLAY', 'TERM_PROGRAM'] as const;
const SELF_NAME = 'tunnedit';

export interface EditorEvents {
    /** The file was written to disk. */
    save: () => void;
    exit: (code: number | null, signal: NodeJS.Signals | null) => void;
    error: (err: Error) => void;
}

/** A running editor with a file open. */
export interface EditorProcess {
    on<E extends keyof EditorEvents>(event: E, listener: EditorEvents[E]): this;
    /** Ask the editor to quit. Never forces it. */
    terminate(): void;
}

export interface EditorLauncher {
    open(filePath: string): EditorProcess;
}

export type Which = (name: string) => string | null;

function isExecutableFile(candidate: string): boolean {
    try {
        fs.accessSync(candidate, fs.constants.X_OK);
        return fs.statSync(candidate).isFile();
    } catch {
        return false;
    }
}

/** Locate an executable on the PATH of `env`. */
export function findExecutable(name: string, env: NodeJS.ProcessEnv = process.env): string | null {
    for (const dir of (env.PATH ?? '').split(path.delimiter)) {
        if (!dir) continue;
        const candidate = path.join(dir, name);
        if (isExecutableFile(candidate)) return candidate;
    }
    return null;
}

/**
 * Pick the editor command: the first of EDITOR, VISUAL and SUDO_EDITOR that is
 * set, unless it points back at tunnedit, else the first fallback on PATH.
 *
 * @returns the command split on whitespace, or null when nothing is usable
 */
export function chooseEditor(
    env: NodeJS.ProcessEnv = process.env,
    which: Which = (name) => findExecutable(name, env),
): string[] | null {
    let editor: string | null = null;
    for (const variable of EDITOR_VARIABLES) {
        const value = env[variable]?.trim();
        if (value) {
            editor = value;
            break;
        }
    }

    if (!editor || editor.includes(SELF_NAME)) {
        editor = null;
        for (const name of FALLBACK_EDITORS) {
            editor = which(name);
            if (editor) break;
        }
    }

    log.debug(`Chosen editor: ${editor ?? '(none)'}`);
    return editor ? editor.split(/\s+/) : null;
}

export function isGraphicalSession(env: NodeJS.ProcessEnv = process.env): boolean {
    return GRAPHICAL_VARIABLES.some((variable) => Boolean(env[variable]));
}

/**
 * An editor run as a child process, with saves picked up by watching the file.
 * Editors that save by writing a new file and renaming it over the old one
 * are seen as saves too.
 */
export class ExternalEditor extends EventEmitter implements EditorProcess {
    private readonly child: ChildProcess;
    private readonly watcher: FSWatcher;
    private debounceTimer: NodeJS.Timeout | null = null;
    private exited = false;

    constructor(
        command: readonly string[],
        readonly filePath: string,
        private readonly debounceMs: number = SAVE_DEBOUNCE_MS,
    ) {
        super();
        const [program, ...args] = command;
        if (!program) {
            throw new Error('Editor command is empty');
        }

        this.watcher = watch(filePath, {
            ignoreInitial: true,
            awaitWriteFinish: { stabilityThreshold: 100, pollInterval: 20 },
        });
        this.watcher.on('change', this.onFileEvent);
        this.watcher.on('add', this.onFileEvent);
        this.watcher.on('error', (err) => log.warn(`Watcher error: ${err.message}`));

        log.debug(`Starting ${program}`, { args: [...args, filePath] });
        this.child = spawn(program, [...args, filePath], { stdio: 'inherit' });
        this.child.on('error', (err) => {
            this.emit('error', err);
            this.onExit(null, null);
        });
        this.child.on('exit', (code, signal) => this.onExit(code, signal));
    }

    terminate(): void {
        if (this.exited || this.child.exitCode !== null) return;
        log.debug('Asking the editor to exit');
        this.child.kill('SIGTERM');
    }

    private readonly onFileEvent = (): void => {
        if (this.exited) return;
        if (this.debounceTimer) clearTimeout(this.debounceTimer);
        this.debounceTimer = setTimeout(() => {
            this.debounceTimer = null;
            this.emit('save');
        }, this.debounceMs);
    };

    private onExit(code: number | null, signal: NodeJS.Signals | null): void {
        if (this.exited) return;
        this.exited = true;
        if (this.debounceTimer) {
            clearTimeout(this.debounceTimer);
            this.debounceTimer = null;
        }
        this.watcher.close().then(
            () => this.emit('exit', code, signal),
            (err: unknown) => {
                log.warn(`Failed to stop watching ${this.filePath}: ${err instanceof Error ? err.message : String(err)}`);
                this.emit('exit', code, signal);
            },
        );
    }
}

export class ExternalEditorLauncher implements EditorLauncher {
    constructor(private readonly command: readonly string[]) {}

    open(filePath: string): ExternalEditor {
        return new ExternalEditor(this.command, filePath);
    }
}
