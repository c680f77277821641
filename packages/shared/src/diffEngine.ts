// ─── Tunnedit: Diff Engine ───────────────────────────────────────────────────

import DiffMatchPatch from 'diff-match-patch';
import { digest } from './checksum';
import { DIFF_CONTEXT_LINES } from './constants';
import { DiffApplicationError } from './errors';

const dmp = new DiffMatchPatch();

const DIFF_DELETE = -1;
const DIFF_INSERT = 1;

// One character per byte, so arbitrary content survives the string round trip.
const ENCODING: BufferEncoding = 'latin1';

const NO_NEWLINE_MARKER = '\\ No newline at end of file';
const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;
const PREAMBLE = /^(--- |\+\+\+ |diff |index )/;
const INDEX_LINE = /^index ([0-9a-f]{64})\.\.([0-9a-f]{64})$/;

export type LineOp = ' ' | '-' | '+';

export interface DiffLine {
    op: LineOp;
    /** Line text including its trailing newline, if it has one. */
    text: string;
}

export interface Hunk {
    oldStart: number;
    oldCount: number;
    newStart: number;
    newCount: number;
    lines: DiffLine[];
}

export interface DiffLabels {
    from: string;
    to: string;
}

/**
 * Split text into lines, keeping each line's terminating newline.
 * A final line without a newline is kept as is.
 */
export function splitLines(text: string): string[] {
    const lines: string[] = [];
    let start = 0;
    while (start < text.length) {
        const nl = text.indexOf('\n', start);
        const end = nl === -1 ? text.length : nl + 1;
        lines.push(text.slice(start, end));
        start = end;
    }
    return lines;
}

function appendAll(target: string[], source: string[]): void {
    for (const item of source) target.push(item);
}

function diffLines(oldText: string, newText: string): DiffLine[] {
    const { chars1, chars2, lineArray } = dmp.diff_linesToChars_(oldText, newText);
    const diffs = dmp.diff_main(chars1, chars2, false);
    dmp.diff_charsToLines_(diffs, lineArray);

    const out: DiffLine[] = [];
    for (const diff of diffs) {
        const op: LineOp = diff[0] === DIFF_INSERT ? '+' : diff[0] === DIFF_DELETE ? '-' : ' ';
        for (const text of splitLines(diff[1])) {
            out.push({ op, text });
        }
    }
    return out;
}

function formatRange(start: number, count: number): string {
    if (count === 1) return `${start}`;
    // An empty range names the line before it.
    if (count === 0) return `${start - 1},0`;
    return `${start},${count}`;
}

export function formatHunkHeader(hunk: Hunk): string {
    return `@@ -${formatRange(hunk.oldStart, hunk.oldCount)} +${formatRange(hunk.newStart, hunk.newCount)} @@`;
}

function buildHunks(ops: DiffLine[], context: number): Hunk[] {
    const changed: number[] = [];
    ops.forEach((op, i) => {
        if (op.op !== ' ') changed.push(i);
    });
    if (changed.length === 0) return [];

    // Group changes whose separating run of context is short enough to share a hunk.
    const groups: Array<[number, number]> = [];
    let groupStart = changed[0];
    let groupEnd = changed[0];
    for (const idx of changed.slice(1)) {
        if (idx - groupEnd - 1 > context * 2) {
            groups.push([groupStart, groupEnd]);
            groupStart = idx;
        }
        groupEnd = idx;
    }
    groups.push([groupStart, groupEnd]);

    const hunks: Hunk[] = [];
    let opIndex = 0;
    let oldLine = 1;
    let newLine = 1;
    for (const [first, last] of groups) {
        const start = Math.max(0, first - context);
        const end = Math.min(ops.length, last + 1 + context);

        for (; opIndex < start; opIndex++) {
            if (ops[opIndex].op !== '+') oldLine++;
            if (ops[opIndex].op !== '-') newLine++;
        }

        const lines = ops.slice(start, end);
        const hunk: Hunk = {
            oldStart: oldLine,
            oldCount: lines.filter((l) => l.op !== '+').length,
            newStart: newLine,
            newCount: lines.filter((l) => l.op !== '-').length,
            lines,
        };
        hunks.push(hunk);
    }
    return hunks;
}

function renderHunk(hunk: Hunk): string {
    let out = `${formatHunkHeader(hunk)}\n`;
    for (const { op, text } of hunk.lines) {
        if (text.endsWith('\n')) {
            out += `${op}${text}`;
        } else {
            out += `${op}${text}\n${NO_NEWLINE_MARKER}\n`;
        }
    }
    return out;
}

/**
 * Produce a unified diff that turns `base` into `target`.
 * Identical inputs produce an empty diff.
 *
 * The `index` line carries the SHA-256 of both sides, which pins the diff
 * to the exact base it was computed from.
 */
export function computeDiff(
    base: Buffer,
    target: Buffer,
    labels: DiffLabels = { from: 'a', to: 'b' },
    context: number = DIFF_CONTEXT_LINES,
): Buffer {
    if (base.equals(target)) return Buffer.alloc(0);

    const hunks = buildHunks(diffLines(base.toString(ENCODING), target.toString(ENCODING)), context);
    let text = `index ${digest(base)}..${digest(target)}\n--- ${labels.from}\n+++ ${labels.to}\n`;
    for (const hunk of hunks) {
        text += renderHunk(hunk);
    }
    return Buffer.from(text, ENCODING);
}

/**
 * Parse the hunks of a unified diff.
 *
 * @throws DiffApplicationError on malformed headers, unknown line prefixes or
 *   line counts that disagree with the hunk header
 */
export function parseDiff(diffText: string): Hunk[] {
    const rows = splitLines(diffText).map((row) => (row.endsWith('\n') ? row.slice(0, -1) : row));
    const hunks: Hunk[] = [];
    let i = 0;

    while (i < rows.length) {
        const row = rows[i];
        const header = HUNK_HEADER.exec(row);
        if (!header) {
            if (PREAMBLE.test(row) && hunks.length === 0) {
                i++;
                continue;
            }
            throw new DiffApplicationError(`Unexpected line outside of a hunk: ${JSON.stringify(row)}`);
        }
        i++;

        const hunk: Hunk = {
            oldStart: Number(header[1]),
            oldCount: header[2] === undefined ? 1 : Number(header[2]),
            newStart: Number(header[3]),
            newCount: header[4] === undefined ? 1 : Number(header[4]),
            lines: [],
        };

        let oldLeft = hunk.oldCount;
        let newLeft = hunk.newCount;
        while (oldLeft > 0 || newLeft > 0) {
            if (i >= rows.length) {
                throw new DiffApplicationError(`Hunk ${formatHunkHeader(hunk)} is truncated`);
            }
            const line = rows[i];
            const prefix = line.charAt(0);
            const text = `${line.slice(1)}\n`;

            if (prefix === ' ' || line.length === 0) {
                oldLeft--;
                newLeft--;
                hunk.lines.push({ op: ' ', text });
            } else if (prefix === '-') {
                oldLeft--;
                hunk.lines.push({ op: '-', text });
            } else if (prefix === '+') {
                newLeft--;
                hunk.lines.push({ op: '+', text });
            } else if (prefix === '\\') {
                stripTrailingNewline(hunk);
            } else {
                throw new DiffApplicationError(`Invalid line in hunk ${formatHunkHeader(hunk)}: ${JSON.stringify(line)}`);
            }

            if (oldLeft < 0 || newLeft < 0) {
                throw new DiffApplicationError(`Hunk ${formatHunkHeader(hunk)} has more lines than its header states`);
            }
            i++;
        }

        // The marker may also follow the hunk's last line.
        if (i < rows.length && rows[i].startsWith('\\')) {
            stripTrailingNewline(hunk);
            i++;
        }
        hunks.push(hunk);
    }
    return hunks;
}

/**
 * Digest of the base named by the diff's `index` line, or `null` when the
 * preamble has none in that form.
 */
export function readBaseDigest(diffText: string): string | null {
    for (const row of splitLines(diffText)) {
        const line = row.endsWith('\n') ? row.slice(0, -1) : row;
        if (HUNK_HEADER.test(line)) break;
        const match = INDEX_LINE.exec(line);
        if (match) return match[1];
    }
    return null;
}

function stripTrailingNewline(hunk: Hunk): void {
    const last = hunk.lines[hunk.lines.length - 1];
    if (!last || !last.text.endsWith('\n')) {
        throw new DiffApplicationError(`Misplaced "${NO_NEWLINE_MARKER}" marker`);
    }
    last.text = last.text.slice(0, -1);
}

/**
 * Apply a unified diff to `base`.
 *
 * Each hunk must match exactly at the line numbers it names; there is no
 * fuzzy matching and no searching for a nearby offset. A diff whose `index`
 * line names another base is refused before any hunk is looked at.
 *
 * @throws DiffApplicationError when the diff does not fit `base`
 */
export function applyDiff(base: Buffer, diff: Buffer): Buffer {
    const diffText = diff.toString(ENCODING);
    const hunks = parseDiff(diffText);
    if (hunks.length === 0) return Buffer.from(base);

    const expectedBase = readBaseDigest(diffText);
    if (expectedBase !== null && expectedBase !== digest(base)) {
        throw new DiffApplicationError(`Diff was computed against another base (${expectedBase.slice(0, 12)})`);
    }

    const lines = splitLines(base.toString(ENCODING));
    const out: string[] = [];
    let cursor = 0;

    for (const hunk of hunks) {
        const label = formatHunkHeader(hunk);
        const start = hunk.oldCount === 0 ? hunk.oldStart : hunk.oldStart - 1;
        if (start < cursor) {
            throw new DiffApplicationError(`Hunk ${label} overlaps the previous hunk`);
        }
        if (start + hunk.oldCount > lines.length) {
            throw new DiffApplicationError(`Hunk ${label} extends past the end of the content`);
        }

        appendAll(out, lines.slice(cursor, start));
        const expectedNewStart = hunk.newCount === 0 ? out.length : out.length + 1;
        if (hunk.newStart !== expectedNewStart) {
            throw new DiffApplicationError(`Hunk ${label} expected at new line ${expectedNewStart}`);
        }

        let pos = start;
        for (const { op, text } of hunk.lines) {
            if (op === '+') {
                out.push(text);
                continue;
            }
            if (lines[pos] !== text) {
                throw new DiffApplicationError(`Hunk ${label} does not match the content at line ${pos + 1}`);
            }
            if (op === ' ') out.push(text);
            pos++;
        }
        cursor = pos;
    }

    appendAll(out, lines.slice(cursor));
    return Buffer.from(out.join(''), ENCODING);
}
