/** Half-open byte span `[start, end)` of the input file. */
export type ByteRange = Readonly<{
  start: number;
  end: number;
}>;

/**
 * One line inside a buffer. `[start, end)` is the content without its
 * terminator; `length` is the raw byte length including `\n` (or `\r\n`).
 */
export type LineSpan = Readonly<{
  start: number;
  end: number;
  length: number;
}>;

export type TypeStats = {
  count: number;
  totalBytes: number;
};

export type MalformedReason =
  | 'empty_line'
  | 'not_an_object'
  | 'unterminated'
  | 'non_string_type'
  | 'invalid_escape'
  | 'invalid_utf8'
  | 'control_character'
  | 'missing_colon';

export const MALFORMED_REASONS: readonly MalformedReason[] = [
  'empty_line',
  'not_an_object',
  'unterminated',
  'non_string_type',
  'invalid_escape',
  'invalid_utf8',
  'control_character',
  'missing_colon',
];

export type SkipReason = 'missing' | MalformedReason;

export type SkipTally = {
  missing: number;
  malformed: Record<MalformedReason, number>;
};

/** One worker's aggregation; valid until merged. */
export type PartialResult = Readonly<{
  types: ReadonlyMap<string, Readonly<TypeStats>>;
  skipped: Readonly<SkipTally>;
  totalLines: number;
  totalBytes: number;
}>;

/** Run-wide aggregation after the merge. */
export type GlobalResult = Readonly<{
  types: ReadonlyMap<string, Readonly<TypeStats>>;
  skipped: Readonly<SkipTally>;
  skippedLines: number;
  totalLines: number;
  totalBytes: number;
}>;

export function emptySkipTally(): SkipTally {
  return {
    missing: 0,
    malformed: {
      empty_line: 0,
      not_an_object: 0,
      unterminated: 0,
      non_string_type: 0,
      invalid_escape: 0,
      invalid_utf8: 0,
      control_character: 0,
      missing_colon: 0,
    },
  };
}

export function countSkipped(tally: Readonly<SkipTally>): number {
  let total = tally.missing;
  for (const reason of MALFORMED_REASONS) {
    total += tally.malformed[reason];
  }
  return total;
}
