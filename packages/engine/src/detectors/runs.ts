/**
 * Sequential, keyboard and repeated run detection.
 *
 * A single left-to-right pass: at each position try a repeated run, then an
 * ascending one, then a descending one, then a keyboard run, and take the
 * first that reaches `minLength`. Reported runs never overlap.
 *
 * Sequential steps are recognised only between two characters of the same
 * class (a-z, A-Z or 0-9). Keyboard runs follow one QWERTY letter row, in
 * either direction, without changing case. Repeated runs apply to any
 * character.
 */

export type Run =
  | { kind: "repeated"; text: string; start: number }
  | { kind: "sequential"; text: string; start: number; direction: "ascending" | "descending" }
  | { kind: "keyboard"; text: string; start: number };

const SEQUENCE_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x61, 0x7a], // a-z
  [0x41, 0x5a], // A-Z
  [0x30, 0x39], // 0-9
];

const KEYBOARD_ROWS = ["qwertyuiop", "asdfghjkl", "zxcvbnm"];

/** Row and column of every row letter, in both cases. */
const KEY_POSITIONS: ReadonlyMap<string, { row: number; col: number }> = new Map(
  KEYBOARD_ROWS.flatMap((letters, row) =>
    [...letters].flatMap((ch, col) => [
      [ch, { row, col }] as const,
      [ch.toUpperCase(), { row: row + KEYBOARD_ROWS.length, col }] as const,
    ]),
  ),
);

function rangeOf(code: number): number {
  return SEQUENCE_RANGES.findIndex(([lo, hi]) => code >= lo && code <= hi);
}

function isStep(a: string, b: string, delta: 1 | -1): boolean {
  const ca = a.codePointAt(0) ?? -1;
  const cb = b.codePointAt(0) ?? -1;
  const range = rangeOf(ca);
  if (range < 0 || range !== rangeOf(cb)) return false;
  return cb - ca === delta;
}

function isKeyStep(a: string, b: string, delta: 1 | -1): boolean {
  const pa = KEY_POSITIONS.get(a);
  const pb = KEY_POSITIONS.get(b);
  if (pa === undefined || pb === undefined) return false;
  return pa.row === pb.row && pb.col - pa.col === delta;
}

/** Exclusive end of the longest run starting at `start`. */
function extend(
  chars: readonly string[],
  start: number,
  linked: (a: string, b: string) => boolean,
): number {
  let end = start + 1;
  while (end < chars.length && linked(chars[end - 1], chars[end])) end++;
  return end;
}

export function findRuns(chars: readonly string[], minLength: number): Run[] {
  const runs: Run[] = [];
  let i = 0;

  while (i < chars.length) {
    const text = (end: number) => chars.slice(i, end).join("");

    const repeatEnd = extend(chars, i, (a, b) => a === b);
    if (repeatEnd - i >= minLength) {
      runs.push({ kind: "repeated", text: text(repeatEnd), start: i });
      i = repeatEnd;
      continue;
    }

    const ascEnd = extend(chars, i, (a, b) => isStep(a, b, 1));
    if (ascEnd - i >= minLength) {
      runs.push({ kind: "sequential", text: text(ascEnd), start: i, direction: "ascending" });
      i = ascEnd;
      continue;
    }

    const descEnd = extend(chars, i, (a, b) => isStep(a, b, -1));
    if (descEnd - i >= minLength) {
      runs.push({ kind: "sequential", text: text(descEnd), start: i, direction: "descending" });
      i = descEnd;
      continue;
    }

    const keyEnd = Math.max(
      extend(chars, i, (a, b) => isKeyStep(a, b, 1)),
      extend(chars, i, (a, b) => isKeyStep(a, b, -1)),
    );
    if (keyEnd - i >= minLength) {
      runs.push({ kind: "keyboard", text: text(keyEnd), start: i });
      i = keyEnd;
      continue;
    }

    i++;
  }

  return runs;
}
