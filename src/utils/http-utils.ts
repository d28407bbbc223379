/**
 * HTTP utility functions
 * @fileoverview Header parsing and formatting helpers shared by the fetcher and responder
 */

import { isErrnoException } from '../middleware/error-handler';

export interface ByteRange {
    start: number;
    end: number;
    length: number;
}

export class RangeParseError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'RangeParseError';
    }
}

export class HttpDateParseError extends Error {
    constructor(value: string) {
        super(`invalid HTTP date: ${value}`);
        this.name = 'HttpDateParseError';
    }
}

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];
const HTTP_DATE = /^(?:Mon|Tue|Wed|Thu|Fri|Sat|Sun), (\d{2}) ([A-Z][a-z]{2}) (\d{4}) (\d{2}):(\d{2}):(\d{2}) GMT$/;

/**
 * Parse an IMF-fixdate, e.g. "Sun, 06 Nov 1994 08:49:37 GMT"
 */
export function parseHttpDate(value: string): Date {
    const match = HTTP_DATE.exec(value);
    if (!match) {
        throw new HttpDateParseError(value);
    }

    const [, day, monthName, year, hours, minutes, seconds] = match;
    const month = MONTHS.indexOf(monthName ?? '');
    if (month < 0) {
        throw new HttpDateParseError(value);
    }

    const fields = [year, day, hours, minutes, seconds].map(field => parseInt(field ?? '', 10));
    const [y = 0, d = 0, h = 0, m = 0, s = 0] = fields;
    const date = new Date(Date.UTC(y, month, d, h, m, s));

    // Reject rollover such as 31 Feb or 25:00:00
    if (date.getUTCDate() !== d || date.getUTCMonth() !== month || date.getUTCHours() !== h ||
        date.getUTCMinutes() !== m || date.getUTCSeconds() !== s) {
        throw new HttpDateParseError(value);
    }

    return date;
}

export function formatHttpDate(date: Date): string {
    return date.toUTCString();
}

/**
 * Same instant one calendar year later
 */
export function addOneYear(date: Date): Date {
    const next = new Date(date.getTime());
    next.setUTCFullYear(next.getUTCFullYear() + 1);
    return next;
}

/**
 * Split an If-None-Match list. A leading W/ marks the whole list weak:
 * it is stripped once and re-applied to every tag.
 */
export function parseIfNoneMatch(header: string | undefined): string[] {
    if (!header) {
        return [];
    }

    let match = header;
    const weak = match.startsWith('W/');
    if (weak) {
        match = match.slice(2);
    }

    return match
        .split(',')
        .map(tag => tag.trim())
        .filter(tag => tag.length > 0)
        .map(tag => (weak ? `W/${tag}` : tag));
}

/**
 * Parse a single byte range against a resource of `size` bytes.
 * Returns null when no Range header was sent.
 */
export function parseRangeHeader(header: string | undefined, size: number): ByteRange | null {
    if (!header) {
        return null;
    }

    const byteRanges = header.startsWith('bytes=') ? header.slice('bytes='.length) : header;
    const parts = byteRanges.split('-');
    if (parts.length !== 2) {
        throw new RangeParseError('invalid range format');
    }

    const [startText = '', endText = ''] = parts.map(part => part.trim());
    if (startText === '' && endText === '') {
        throw new RangeParseError('invalid range format');
    }
    if (startText !== '' && !/^\d+$/.test(startText)) {
        throw new RangeParseError('invalid start value');
    }
    if (endText !== '' && !/^\d+$/.test(endText)) {
        throw new RangeParseError('invalid end value');
    }

    let start: number;
    let end: number;

    if (startText === '') {
        // Suffix range: the last N bytes
        start = Math.max(0, size - parseInt(endText, 10));
        end = size - 1;
    } else {
        start = parseInt(startText, 10);
        end = endText === '' ? size - 1 : parseInt(endText, 10);
    }

    if (end >= size) {
        end = size - 1;
    }
    if (start > end) {
        throw new RangeParseError('start > end');
    }

    return { start, end, length: end - start + 1 };
}

export function formatContentRange(range: ByteRange, size: number): string {
    return `bytes ${range.start}-${range.end}/${size}`;
}

/**
 * Join an origin base URL and a resource path with exactly one slash
 */
export function joinUrl(base: string, path: string): string {
    return `${base.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

const DISCONNECT_CODES = ['EPIPE', 'ECONNRESET', 'ERR_STREAM_PREMATURE_CLOSE', 'ERR_STREAM_DESTROYED'];

/**
 * True when a write failed because the client went away
 */
export function isClientDisconnect(error: unknown): boolean {
    return isErrnoException(error) && error.code !== undefined && DISCONNECT_CODES.includes(error.code);
}

/**
 * First value of a header that may be repeated
 */
export function headerValue(value: unknown): string {
    if (typeof value === 'string') {
        return value;
    }
    if (typeof value === 'number') {
        return String(value);
    }
    if (Array.isArray(value)) {
        const first: unknown = value[0];
        return typeof first === 'string' ? first : '';
    }
    return '';
}
