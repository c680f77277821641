// ─── Tunnedit Host: Shell Export Line ────────────────────────────────────────

import path from 'path';

export type ShellFormat = 'bash' | 'csh' | 'fish';

const SHELL_FORMATS: Record<ShellFormat, (name: string, value: string) => string> = {
    bash: (name, value) => `export ${name}=${value}`,
    csh: (name, value) => `setenv ${name} ${value}`,
    fish: (name, value) => `setenv ${name} ${value}`,
};

const SAFE_WORD = /^[\w./:@%+=,-]+$/;

function isShellFormat(name: string): name is ShellFormat {
    return name in SHELL_FORMATS;
}

/**
 * Map a shell name (or path) onto a known export syntax. Unknown shells ending
 * in `csh` are treated as csh; everything else gets bash syntax.
 */
export function resolveShell(shell: string): ShellFormat {
    const name = path.basename(shell.trim());
    if (isShellFormat(name)) return name;
    return name.endsWith('csh') ? 'csh' : 'bash';
}

export function detectShell(env: NodeJS.ProcessEnv): string {
    return path.basename(env.SHELL ?? '') || 'bash';
}

/** Single-quote a value unless it is made only of characters every shell leaves alone. */
export function shellQuote(value: string): string {
    if (SAFE_WORD.test(value)) return value;
    return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function exportCommand(name: string, value: string, shell: string): string {
    return SHELL_FORMATS[resolveShell(shell)](name, shellQuote(value));
}
