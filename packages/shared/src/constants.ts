// ─── Constants & Configuration ───────────────────────────────────────────────

/** Wire protocol version spoken by this implementation */
export const PROTOCOL_VERSION = 1;

/** Protocol versions a client accepts on the initial frame */
export const SUPPORTED_VERSIONS: readonly string[] = ['1'];

/** Header names used by protocol version 1 */
export const HEADER = {
    VERSION: 'Version',
    FILENAME: 'Filename',
    FILESIZE: 'Filesize',
    SIZE: 'Size',
    DIFFERENTIAL: 'Differential',
    CHECKSUM: 'Checksum',
} as const;

/** Wire spelling of boolean header values */
export const TRUE_VALUE = 'True';
export const FALSE_VALUE = 'False';

/** Largest frame body accepted by default (bytes) – 64 MB */
export const DEFAULT_MAX_BODY_SIZE = 64 * 1024 * 1024;

/** Largest header block accepted before the blank line (bytes) */
export const MAX_HEADER_BLOCK_SIZE = 64 * 1024;

/** Lines of unchanged context around each diff hunk */
export const DIFF_CONTEXT_LINES = 3;

/** Debounce interval for editor save events (ms) */
export const SAVE_DEBOUNCE_MS = 150;

/** Environment variable carrying the socket address */
export const SOCKET_ENV_VAR = 'TUNNEDIT_SOCK';

/** File name of the socket inside a socket directory */
export const SOCKET_FILE_NAME = 'socket';

/** Version */
export const VERSION = '1.0.0';
