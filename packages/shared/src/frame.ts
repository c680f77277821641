// ─── Tunnedit: Frame Codec ───────────────────────────────────────────────────

/**
 * A frame is a block of `Name: Value` header lines, a blank line, then
 * exactly `Size` bytes of body:
 *
 *     Version: 1
 *     "  Padded name ": "value: with a colon"
 *     Size: 5
 *
 *     hello
 *
 * Header text is UTF-8. A name or value is quoted iff it has whitespace at
 * either edge or contains one of `:` `"` `\` CR LF. Inside quotes the only
 * escapes are `\"`, `\\`, `\n` and `\r`.
 */

import { DEFAULT_MAX_BODY_SIZE, HEADER, MAX_HEADER_BLOCK_SIZE } from './constants';
import { IncompleteFrameError, ProtocolError } from './errors';
import type { Frame, FrameHeaders, FrameLimits } from './types';

const LF = 0x0a;
const BLANK_LINE = Buffer.from('\n\n', 'utf8');
const NEEDS_QUOTING = /[:"\\\r\n]/;
const FORBIDDEN_IN_NAME = /[:\r\n]/;
const SIZE_PATTERN = /^\d+$/;

const ESCAPES: Record<string, string> = {
    '"': '\\"',
    '\\': '\\\\',
    '\n': '\\n',
    '\r': '\\r',
};

const UNESCAPES: Record<string, string> = {
    '"': '"',
    '\\': '\\',
    n: '\n',
    r: '\r',
};

export const DEFAULT_FRAME_LIMITS: FrameLimits = {
    maxBodySize: DEFAULT_MAX_BODY_SIZE,
    maxHeaderSize: MAX_HEADER_BLOCK_SIZE,
};

export type HeaderInput = FrameHeaders | Record<string, string>;

// ─── Quoting ─────────────────────────────────────────────────────────────────

export function needsQuoting(field: string): boolean {
    return field !== field.trim() || NEEDS_QUOTING.test(field);
}

export function quoteField(field: string): string {
    return `"${field.replace(/["\\\r\n]/g, (ch) => ESCAPES[ch] ?? ch)}"`;
}

function renderField(field: string): string {
    return needsQuoting(field) ? quoteField(field) : field;
}

/**
 * Read a quoted field starting at `start` (which must hold the opening quote).
 * Returns the unescaped text and the index just past the closing quote.
 */
function readQuoted(line: string, start: number): [string, number] {
    let out = '';
    let i = start + 1;
    while (i < line.length) {
        const ch = line[i];
        if (ch === '"') {
            return [out, i + 1];
        }
        if (ch === '\\') {
            const next = line[i + 1];
            const replacement = next === undefined ? undefined : UNESCAPES[next];
            if (replacement === undefined) {
                throw new ProtocolError(`Invalid escape sequence in header: ${line}`);
            }
            out += replacement;
            i += 2;
            continue;
        }
        out += ch;
        i++;
    }
    throw new ProtocolError(`Unterminated quote in header: ${line}`);
}

function skipWhitespace(line: string, pos: number): number {
    while (pos < line.length && /\s/.test(line.charAt(pos))) pos++;
    return pos;
}

function assertValidName(name: string): void {
    if (name.length === 0) {
        throw new ProtocolError('Header name must not be empty');
    }
    if (FORBIDDEN_IN_NAME.test(name)) {
        throw new ProtocolError(`Header name must not contain ':' or a newline: ${JSON.stringify(name)}`);
    }
}

// ─── Header lines ────────────────────────────────────────────────────────────

export function encodeHeaderLine(name: string, value: string): string {
    assertValidName(name);
    return `${renderField(name)}: ${renderField(value)}\n`;
}

export function parseHeaderLine(line: string): [string, string] {
    let pos = skipWhitespace(line, 0);
    let name: string;

    if (line[pos] === '"') {
        [name, pos] = readQuoted(line, pos);
        pos = skipWhitespace(line, pos);
        if (line[pos] !== ':') {
            throw new ProtocolError(`Expected ':' after quoted header name: ${line}`);
        }
    } else {
        const colon = line.indexOf(':', pos);
        if (colon === -1) {
            throw new ProtocolError(`Missing ':' in header line: ${line}`);
        }
        name = line.slice(pos, colon).trim();
        pos = colon;
    }
    assertValidName(name);

    const rest = line.slice(pos + 1).trim();
    if (!rest.startsWith('"')) {
        return [name, rest];
    }

    const [value, end] = readQuoted(rest, 0);
    if (rest.slice(end).trim() !== '') {
        throw new ProtocolError(`Unexpected text after quoted header value: ${line}`);
    }
    return [name, value];
}

export function parseHeaderBlock(text: string): FrameHeaders {
    const headers: FrameHeaders = new Map();
    if (text.length === 0) return headers;

    for (const line of text.split('\n')) {
        const [name, value] = parseHeaderLine(line);
        if (headers.has(name)) {
            throw new ProtocolError(`Duplicate header: ${name}`);
        }
        headers.set(name, value);
    }
    return headers;
}

/**
 * Parse a non-negative decimal byte count such as `Size` or `Filesize`.
 */
export function parseByteCount(name: string, value: string): number {
    if (!SIZE_PATTERN.test(value)) {
        throw new ProtocolError(`Invalid ${name} header: ${JSON.stringify(value)}`);
    }
    const count = Number(value);
    if (!Number.isSafeInteger(count)) {
        throw new ProtocolError(`${name} header out of range: ${value}`);
    }
    return count;
}

function bodySize(headers: FrameHeaders, limits: FrameLimits): number {
    const raw = headers.get(HEADER.SIZE);
    if (raw === undefined) return 0;
    const size = parseByteCount(HEADER.SIZE, raw);
    if (size > limits.maxBodySize) {
        throw new ProtocolError(`Frame body of ${size} bytes exceeds limit of ${limits.maxBodySize}`);
    }
    return size;
}

// ─── Frames ──────────────────────────────────────────────────────────────────

function toHeaderMap(input: HeaderInput): FrameHeaders {
    return input instanceof Map ? new Map(input) : new Map(Object.entries(input));
}

/**
 * Encode a frame for transmission.
 *
 * When a body is given (or a `Size` header is already present) `Size` is set
 * from the body length, keeping its position if it was already there.
 */
export function encodeFrame(headers: HeaderInput, body?: Buffer): Buffer {
    const map = toHeaderMap(headers);
    const payload = body ?? Buffer.alloc(0);
    if (body !== undefined || map.has(HEADER.SIZE)) {
        map.set(HEADER.SIZE, String(payload.length));
    }

    let text = '';
    for (const [name, value] of map) {
        text += encodeHeaderLine(name, value);
    }
    text += '\n';

    return Buffer.concat([Buffer.from(text, 'utf8'), payload]);
}

/**
 * Extract one complete frame from the front of a receive buffer.
 *
 * @returns the frame and the bytes after it, or null if more data is needed
 * @throws ProtocolError as soon as the header block is complete and malformed
 */
export function extractFrame(
    buffer: Buffer,
    limits: FrameLimits = DEFAULT_FRAME_LIMITS,
): { frame: Frame; remaining: Buffer } | null {
    if (buffer.length === 0) return null;

    let headerEnd: number;
    let bodyStart: number;
    if (buffer[0] === LF) {
        headerEnd = 0;
        bodyStart = 1;
    } else {
        const idx = buffer.indexOf(BLANK_LINE);
        if (idx === -1) {
            if (buffer.length > limits.maxHeaderSize) {
                throw new ProtocolError(`Header block exceeds limit of ${limits.maxHeaderSize} bytes`);
            }
            return null;
        }
        headerEnd = idx;
        bodyStart = idx + BLANK_LINE.length;
    }

    if (headerEnd > limits.maxHeaderSize) {
        throw new ProtocolError(`Header block exceeds limit of ${limits.maxHeaderSize} bytes`);
    }

    const headers = parseHeaderBlock(buffer.toString('utf8', 0, headerEnd));
    const size = bodySize(headers, limits);
    const frameEnd = bodyStart + size;
    if (buffer.length < frameEnd) return null;

    return {
        frame: { headers, body: Buffer.from(buffer.subarray(bodyStart, frameEnd)) },
        remaining: buffer.subarray(frameEnd),
    };
}

/**
 * Decode a buffer that holds exactly one frame.
 *
 * @throws IncompleteFrameError when the buffer ends before the header block
 *   or the body is complete
 */
export function decodeFrame(buffer: Buffer, limits: FrameLimits = DEFAULT_FRAME_LIMITS): Frame {
    const result = extractFrame(buffer, limits);
    if (!result) {
        throw new IncompleteFrameError(`Incomplete frame (${buffer.length} bytes)`, buffer.length);
    }
    if (result.remaining.length > 0) {
        throw new ProtocolError(`${result.remaining.length} trailing bytes after frame`);
    }
    return result.frame;
}
