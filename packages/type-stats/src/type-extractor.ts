import type { MalformedReason } from './types.js';

const QUOTE = 0x22;
const BACKSLASH = 0x5c;
const COLON = 0x3a;
const OPEN_BRACE = 0x7b;
const CLOSE_BRACE = 0x7d;
const OPEN_BRACKET = 0x5b;
const CLOSE_BRACKET = 0x5d;

/**
 * Extracted `type` value. `borrowed` points into the scanned buffer and is
 * only valid while that buffer is; `owned` holds a decoded copy and is
 * produced only when the value contained escape sequences.
 */
export type TypeKey =
  | Readonly<{ kind: 'borrowed'; bytes: Uint8Array; start: number; end: number }>
  | Readonly<{ kind: 'owned'; value: string }>;

export type Extraction =
  | Readonly<{ kind: 'found'; key: TypeKey }>
  | Readonly<{ kind: 'missing' }>
  | Readonly<{ kind: 'malformed'; reason: MalformedReason }>;

const MISSING: Extraction = Object.freeze({ kind: 'missing' });

const MALFORMED: Readonly<Record<MalformedReason, Extraction>> = {
  empty_line: Object.freeze({ kind: 'malformed', reason: 'empty_line' }),
  not_an_object: Object.freeze({ kind: 'malformed', reason: 'not_an_object' }),
  unterminated: Object.freeze({ kind: 'malformed', reason: 'unterminated' }),
  non_string_type: Object.freeze({ kind: 'malformed', reason: 'non_string_type' }),
  invalid_escape: Object.freeze({ kind: 'malformed', reason: 'invalid_escape' }),
  invalid_utf8: Object.freeze({ kind: 'malformed', reason: 'invalid_utf8' }),
  control_character: Object.freeze({ kind: 'malformed', reason: 'control_character' }),
  missing_colon: Object.freeze({ kind: 'malformed', reason: 'missing_colon' }),
};

// U+FEFF is content inside a value, never a byte order mark to strip.
const utf8Decoder = new TextDecoder('utf-8', { ignoreBOM: true });

const STRING_UNTERMINATED = -1;
const STRING_INVALID_UTF8 = -2;

function isWhitespace(c: number): boolean {
  return c === 0x20 || c === 0x09 || c === 0x0a || c === 0x0d;
}

function skipWhitespace(bytes: Uint8Array, i: number, end: number): number {
  while (i < end && isWhitespace(bytes[i])) i += 1;
  return i;
}

/**
 * Index of the closing quote of a string whose body starts at `i`, or
 * STRING_UNTERMINATED / STRING_INVALID_UTF8.
 */
function findStringEnd(bytes: Uint8Array, i: number, end: number): number {
  while (i < end) {
    const c = bytes[i];
    if (c === QUOTE) return i;
    if (c === BACKSLASH) {
      // A multibyte character after the backslash is still checked below.
      i += i + 1 < end && bytes[i + 1] < 0x80 ? 2 : 1;
      continue;
    }
    if (c < 0x80) {
      i += 1;
      continue;
    }
    const length = utf8SequenceLength(bytes, i, end);
    if (length === 0) return STRING_INVALID_UTF8;
    i += length;
  }
  return STRING_UNTERMINATED;
}

function isWellFormedUtf8(bytes: Uint8Array, i: number, end: number): boolean {
  while (i < end) {
    if (bytes[i] < 0x80) {
      i += 1;
      continue;
    }
    const length = utf8SequenceLength(bytes, i, end);
    if (length === 0) return false;
    i += length;
  }
  return true;
}

function isTypeLiteral(bytes: Uint8Array, start: number, end: number): boolean {
  return (
    end - start === 4 &&
    bytes[start] === 0x74 && // t
    bytes[start + 1] === 0x79 && // y
    bytes[start + 2] === 0x70 && // p
    bytes[start + 3] === 0x65 // e
  );
}

/**
 * Length of the well-formed UTF-8 sequence starting at `i`, or 0 when the
 * bytes there are not one (overlongs, surrogates, > U+10FFFF, truncation).
 */
export function utf8SequenceLength(bytes: Uint8Array, i: number, end: number): number {
  const b0 = bytes[i];
  if (b0 < 0x80) return 1;

  let length: number;
  let lo = 0x80;
  let hi = 0xbf;
  if (b0 >= 0xc2 && b0 <= 0xdf) {
    length = 2;
  } else if (b0 >= 0xe0 && b0 <= 0xef) {
    length = 3;
    if (b0 === 0xe0) lo = 0xa0;
    else if (b0 === 0xed) hi = 0x9f;
  } else if (b0 >= 0xf0 && b0 <= 0xf4) {
    length = 4;
    if (b0 === 0xf0) lo = 0x90;
    else if (b0 === 0xf4) hi = 0x8f;
  } else {
    return 0;
  }

  if (i + length > end) return 0;
  const b1 = bytes[i + 1];
  if (b1 < lo || b1 > hi) return 0;
  for (let k = 2; k < length; k += 1) {
    const b = bytes[i + k];
    if (b < 0x80 || b > 0xbf) return 0;
  }
  return length;
}

function hexValue(c: number): number {
  if (c >= 0x30 && c <= 0x39) return c - 0x30;
  if (c >= 0x41 && c <= 0x46) return c - 0x41 + 10;
  if (c >= 0x61 && c <= 0x66) return c - 0x61 + 10;
  return -1;
}

/** Reads `\uXXXX` whose `u` sits at `i`; returns the code unit or -1. */
function readHex4(bytes: Uint8Array, i: number, end: number): number {
  if (i + 5 > end) return -1;
  let value = 0;
  for (let k = 1; k <= 4; k += 1) {
    const digit = hexValue(bytes[i + k]);
    if (digit < 0) return -1;
    value = (value << 4) | digit;
  }
  return value;
}

/**
 * Decodes the JSON string body `bytes[start, end)` (already checked for
 * well-formed UTF-8). Returns null on an invalid escape.
 */
export function decodeJsonString(bytes: Uint8Array, start: number, end: number): string | null {
  let out = '';
  let runStart = start;
  let i = start;

  while (i < end) {
    if (bytes[i] !== BACKSLASH) {
      i += 1;
      continue;
    }
    if (i > runStart) out += utf8Decoder.decode(bytes.subarray(runStart, i));
    if (i + 1 >= end) return null;

    const esc = bytes[i + 1];
    switch (esc) {
      case QUOTE:
        out += '"';
        break;
      case BACKSLASH:
        out += '\\';
        break;
      case 0x2f: // /
        out += '/';
        break;
      case 0x62: // b
        out += '\b';
        break;
      case 0x66: // f
        out += '\f';
        break;
      case 0x6e: // n
        out += '\n';
        break;
      case 0x72: // r
        out += '\r';
        break;
      case 0x74: // t
        out += '\t';
        break;
      case 0x75: {
        // u
        const unit = readHex4(bytes, i + 1, end);
        if (unit < 0) return null;
        if (unit >= 0xdc00 && unit <= 0xdfff) return null;
        if (unit >= 0xd800 && unit <= 0xdbff) {
          // High surrogate: a low surrogate escape must follow.
          if (bytes[i + 6] !== BACKSLASH || bytes[i + 7] !== 0x75) return null;
          const low = readHex4(bytes, i + 7, end);
          if (low < 0xdc00 || low > 0xdfff) return null;
          out += String.fromCharCode(unit, low);
          i += 12;
        } else {
          out += String.fromCharCode(unit);
          i += 6;
        }
        runStart = i;
        continue;
      }
      default:
        return null;
    }
    i += 2;
    runStart = i;
  }

  if (end > runStart) out += utf8Decoder.decode(bytes.subarray(runStart, end));
  return out;
}

/**
 * Reads the string value whose body starts at `start`. The rest of the line
 * after the closing quote must still be well-formed UTF-8.
 */
function readStringValue(bytes: Uint8Array, start: number, end: number): Extraction {
  let hasEscape = false;
  let i = start;

  while (i < end) {
    const c = bytes[i];
    if (c === QUOTE) {
      if (!isWellFormedUtf8(bytes, i + 1, end)) return MALFORMED.invalid_utf8;
      if (!hasEscape) {
        return { kind: 'found', key: { kind: 'borrowed', bytes, start, end: i } };
      }
      const value = decodeJsonString(bytes, start, i);
      return value === null
        ? MALFORMED.invalid_escape
        : { kind: 'found', key: { kind: 'owned', value } };
    }
    if (c === BACKSLASH) {
      if (i + 1 < end && bytes[i + 1] >= 0x80) return MALFORMED.invalid_escape;
      hasEscape = true;
      i += 2;
      continue;
    }
    if (c < 0x20) return MALFORMED.control_character;
    if (c < 0x80) {
      i += 1;
      continue;
    }
    const length = utf8SequenceLength(bytes, i, end);
    if (length === 0) return MALFORMED.invalid_utf8;
    i += length;
  }
  return MALFORMED.unterminated;
}

/**
 * Finds the first top-level `"type"` key of the JSON object in
 * `bytes[start, end)` and returns its string value, without parsing the rest
 * of the object. Every byte of the line must be well-formed UTF-8.
 */
export function extractType(bytes: Uint8Array, start: number, end: number): Extraction {
  let i = skipWhitespace(bytes, start, end);
  if (i >= end) return MALFORMED.empty_line;
  if (bytes[i] !== OPEN_BRACE) return MALFORMED.not_an_object;

  let depth = 1;
  // At depth 1 the next string is a key right after `{` or `,`.
  let expectKey = true;
  i += 1;
  while (i < end) {
    const c = bytes[i];

    if (c === QUOTE) {
      const bodyStart = i + 1;
      const closing = findStringEnd(bytes, bodyStart, end);
      if (closing === STRING_INVALID_UTF8) return MALFORMED.invalid_utf8;
      if (closing < 0) return MALFORMED.unterminated;
      i = closing + 1;

      if (depth === 1 && expectKey) {
        expectKey = false;
        let j = skipWhitespace(bytes, i, end);
        if (j >= end) return MALFORMED.unterminated;
        if (bytes[j] !== COLON) return MALFORMED.missing_colon;
        if (isTypeLiteral(bytes, bodyStart, closing)) {
          j = skipWhitespace(bytes, j + 1, end);
          if (j >= end) return MALFORMED.unterminated;
          if (bytes[j] !== QUOTE) {
            return isWellFormedUtf8(bytes, j, end)
              ? MALFORMED.non_string_type
              : MALFORMED.invalid_utf8;
          }
          return readStringValue(bytes, j + 1, end);
        }
      }
      continue;
    }

    if (c >= 0x80) {
      const length = utf8SequenceLength(bytes, i, end);
      if (length === 0) return MALFORMED.invalid_utf8;
      i += length;
      continue;
    }

    if (c === OPEN_BRACE || c === OPEN_BRACKET) {
      depth += 1;
    } else if (c === CLOSE_BRACE || c === CLOSE_BRACKET) {
      depth -= 1;
      if (depth === 0) {
        return isWellFormedUtf8(bytes, i + 1, end) ? MISSING : MALFORMED.invalid_utf8;
      }
    } else if (c === 0x2c && depth === 1) {
      // ,
      expectKey = true;
    }
    i += 1;
  }
  return MALFORMED.unterminated;
}

export function typeKeyToString(key: TypeKey): string {
  return key.kind === 'owned' ? key.value : utf8Decoder.decode(key.bytes.subarray(key.start, key.end));
}

export function typeKeyEquals(a: TypeKey, b: TypeKey): boolean {
  return typeKeyToString(a) === typeKeyToString(b);
}
