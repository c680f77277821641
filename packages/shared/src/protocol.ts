// ─── Tunnedit: Version 1 Frames ──────────────────────────────────────────────

import { digest, isHex64 } from './checksum';
import { FALSE_VALUE, HEADER, PROTOCOL_VERSION, SUPPORTED_VERSIONS, TRUE_VALUE } from './constants';
import { computeDiff } from './diffEngine';
import { ProtocolError, SizeMismatchError, UnsupportedVersionError } from './errors';
import { parseByteCount } from './frame';
import type { Frame, FrameHeaders, UpdatePayload } from './types';

export interface OutgoingFrame {
    headers: FrameHeaders;
    body: Buffer;
}

export interface InitialFile {
    version: string;
    filename: string;
    content: Buffer;
}

function requireHeader(headers: FrameHeaders, name: string): string {
    const value = headers.get(name);
    if (value === undefined) {
        throw new ProtocolError(`Missing ${name} header`);
    }
    return value;
}

export function buildInitialFrame(filename: string, content: Buffer): OutgoingFrame {
    const headers: FrameHeaders = new Map([
        [HEADER.VERSION, String(PROTOCOL_VERSION)],
        [HEADER.FILENAME, filename],
        [HEADER.FILESIZE, String(content.length)],
        [HEADER.SIZE, String(content.length)],
    ]);
    return { headers, body: content };
}

/**
 * Validate the handshake frame a client receives first.
 *
 * @throws UnsupportedVersionError for a version this side does not speak
 * @throws ProtocolError for missing headers or a Filesize that disagrees with the body
 */
export function readInitialFrame(frame: Frame, supported: readonly string[] = SUPPORTED_VERSIONS): InitialFile {
    const version = requireHeader(frame.headers, HEADER.VERSION);
    if (!supported.includes(version)) {
        throw new UnsupportedVersionError(version);
    }

    const filename = requireHeader(frame.headers, HEADER.FILENAME);
    const filesize = parseByteCount(HEADER.FILESIZE, requireHeader(frame.headers, HEADER.FILESIZE));
    if (filesize !== frame.body.length) {
        throw new ProtocolError(`Filesize ${filesize} does not match body of ${frame.body.length} bytes`);
    }
    return { version, filename, content: frame.body };
}

export function fullUpdate(content: Buffer): UpdatePayload {
    return { kind: 'full', content };
}

/** Build a differential update that turns `base` into `content`. */
export function differentialUpdate(base: Buffer, content: Buffer, filename = 'file'): UpdatePayload {
    return {
        kind: 'differential',
        diff: computeDiff(base, content, { from: `a/${filename}`, to: `b/${filename}` }),
        resultingFilesize: content.length,
        resultingChecksum: digest(content),
    };
}

export function buildUpdateFrame(payload: UpdatePayload): OutgoingFrame {
    if (payload.kind === 'full') {
        return {
            headers: new Map([
                [HEADER.DIFFERENTIAL, FALSE_VALUE],
                [HEADER.FILESIZE, String(payload.content.length)],
                [HEADER.SIZE, String(payload.content.length)],
            ]),
            body: payload.content,
        };
    }
    return {
        headers: new Map([
            [HEADER.DIFFERENTIAL, TRUE_VALUE],
            [HEADER.FILESIZE, String(payload.resultingFilesize)],
            [HEADER.CHECKSUM, payload.resultingChecksum],
            [HEADER.SIZE, String(payload.diff.length)],
        ]),
        body: payload.diff,
    };
}

/**
 * Interpret an update frame sent by the client.
 *
 * @throws ProtocolError when the describing headers are malformed
 * @throws SizeMismatchError when a full update's Filesize disagrees with its body
 */
export function readUpdatePayload(frame: Frame): UpdatePayload {
    const differential = frame.headers.get(HEADER.DIFFERENTIAL) ?? FALSE_VALUE;

    if (differential === FALSE_VALUE) {
        const filesize = frame.headers.get(HEADER.FILESIZE);
        if (filesize !== undefined) {
            const expected = parseByteCount(HEADER.FILESIZE, filesize);
            if (expected !== frame.body.length) {
                throw new SizeMismatchError(expected, frame.body.length);
            }
        }
        return fullUpdate(frame.body);
    }

    if (differential !== TRUE_VALUE) {
        throw new ProtocolError(`Invalid ${HEADER.DIFFERENTIAL} header: ${JSON.stringify(differential)}`);
    }

    const resultingFilesize = parseByteCount(HEADER.FILESIZE, requireHeader(frame.headers, HEADER.FILESIZE));
    const resultingChecksum = requireHeader(frame.headers, HEADER.CHECKSUM);
    if (!isHex64(resultingChecksum)) {
        throw new ProtocolError(`Invalid ${HEADER.CHECKSUM} header: ${JSON.stringify(resultingChecksum)}`);
    }
    return { kind: 'differential', diff: frame.body, resultingFilesize, resultingChecksum };
}
