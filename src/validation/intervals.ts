import { parseTimestamp } from "../datetime.utils.js";

/**
 * A `[start, end]` pair of RFC3339 timestamps. A missing `end` makes the
 * interval unbounded (an open-ended vehicle shift).
 */
export type IntervalInput = readonly [start: string, end?: string];

/**
 * A problem found in a list of time windows. Indices refer to positions in
 * the list passed to {@link checkTimeWindows}.
 */
export type IntervalIssue =
  | {
      readonly kind: "unparseable";
      readonly index: number;
      /** Which endpoint(s) failed to parse. */
      readonly endpoints: readonly ("start" | "end")[];
    }
  | {
      readonly kind: "reversed";
      readonly index: number;
    }
  | {
      readonly kind: "overlap";
      /** `[earlier, later]`: indices ordered by window start. */
      readonly indices: readonly [number, number];
    };

/** A window whose endpoints parsed, in epoch milliseconds. */
export interface ParsedInterval {
  readonly index: number;
  readonly start: number;
  readonly end: number;
}

/**
 * Parses a single window. Returns the parsed interval, or the issue that
 * makes it unusable.
 */
export function parseInterval(
  window: IntervalInput,
  index: number,
): ParsedInterval | Extract<IntervalIssue, { kind: "unparseable" | "reversed" }> {
  const [rawStart, rawEnd] = window;
  const start = parseTimestamp(rawStart);
  const end = rawEnd === undefined ? Number.POSITIVE_INFINITY : parseTimestamp(rawEnd);

  const endpoints: ("start" | "end")[] = [];
  if (start === undefined) endpoints.push("start");
  if (end === undefined) endpoints.push("end");
  if (start === undefined || end === undefined) {
    return { kind: "unparseable", index, endpoints };
  }

  if (start >= end) return { kind: "reversed", index };
  return { index, start, end };
}

/**
 * Validates a list of time windows.
 *
 * Each window must have parseable endpoints and a start strictly before its
 * end; windows failing either check are reported and left out of the overlap
 * check. The remaining windows must be pairwise disjoint.
 *
 * Intervals are half-open: `[10:00, 12:00)` and `[12:00, 14:00)` touch but do
 * not overlap.
 *
 * Issues come in a stable order: per-window issues in input order, then
 * overlaps ordered by the later window's start.
 *
 * @example
 * ```typescript
 * checkTimeWindows([
 *   ["2020-07-04T10:00:00Z", "2020-07-04T14:00:00Z"],
 *   ["2020-07-04T13:00:00Z", "2020-07-04T17:00:00Z"],
 * ]);
 * // [{ kind: "overlap", indices: [0, 1] }]
 * ```
 */
export function checkTimeWindows(windows: readonly IntervalInput[]): IntervalIssue[] {
  const issues: IntervalIssue[] = [];
  const parsed: ParsedInterval[] = [];

  windows.forEach((window, index) => {
    const result = parseInterval(window, index);
    if ("kind" in result) {
      issues.push(result);
    } else {
      parsed.push(result);
    }
  });

  return [...issues, ...findOverlaps(parsed)];
}

/**
 * Finds overlapping pairs among valid intervals.
 *
 * Each interval is compared with the interval reaching furthest so far, so an
 * interval nested in a long earlier one is caught even when a short interval
 * sits between them.
 */
export function findOverlaps(intervals: readonly ParsedInterval[]): IntervalIssue[] {
  const sorted = intervals.toSorted((a, b) => a.start - b.start || a.index - b.index);
  const issues: IntervalIssue[] = [];

  let reach: ParsedInterval | undefined;
  for (const interval of sorted) {
    if (reach && interval.start < reach.end) {
      issues.push({ kind: "overlap", indices: [reach.index, interval.index] });
    }
    if (!reach || interval.end > reach.end) {
      reach = interval;
    }
  }

  return issues;
}

/**
 * Returns true if `inner` lies within `outer` (endpoints may coincide).
 */
export function containsInterval(outer: ParsedInterval, inner: ParsedInterval): boolean {
  return inner.start >= outer.start && inner.end <= outer.end;
}
