/**
 * Lexicographic position tokens.
 * Cards sort by plain string comparison of their positions, so a card can be
 * placed between two others without renumbering anything.
 */

type CodeRange = readonly [number, number];

const LETTERS: CodeRange = [0x61, 0x7a];
const DIGITS: CodeRange = [0x30, 0x39];
const PRINTABLE: CodeRange = [0x21, 0x7e];
const ANY: CodeRange = [0x00, 0xffff];

/**
 * Middle code strictly between `low` and `high`, taken from the first range
 * that has room. -1 stands for "no character" below everything.
 */
function midCode(low: number, high: number, ranges: readonly CodeRange[]): number | null {
  for (const [from, to] of ranges) {
    const start = Math.max(low + 1, from);
    const end = Math.min(high - 1, to);
    if (start <= end) return Math.floor((start + end) / 2);
  }
  return null;
}

/** Position for the first card of an empty column. */
export function first(): string {
  return "n";
}

/** A position that sorts after `position`. */
export function after(position: string): string {
  for (let i = 0; i < position.length; i++) {
    const code = midCode(position.charCodeAt(i), Infinity, [LETTERS]);
    if (code !== null) return position.slice(0, i) + String.fromCharCode(code);
  }
  return position + "m";
}

/** A position that sorts before `position` (which must not be empty). */
export function before(position: string): string {
  return between("", position);
}

/**
 * A position strictly between `low` and `high`.
 * Prefers letters, then digits, then any other character. When `low` is not
 * below `high` there is no room and the result sorts after `low`.
 */
export function between(low: string, high: string): string {
  let prefix = "";

  for (let i = 0; i < high.length; i++) {
    const lowCode = i < low.length ? low.charCodeAt(i) : -1;
    const highCode = high.charCodeAt(i);

    if (lowCode === highCode) {
      prefix += high[i];
      continue;
    }

    const letter = midCode(lowCode, highCode, [LETTERS]);
    if (letter === LETTERS[0]) {
      // A position ending in "a" has no letters below it.
      return prefix + "an";
    }
    if (letter !== null) return prefix + String.fromCharCode(letter);

    // Past the end of low, matching high one more character may leave room for a letter.
    if (lowCode === -1 && i < high.length - 1) {
      prefix += high[i];
      continue;
    }

    const other = midCode(lowCode, highCode, [DIGITS, PRINTABLE, ANY]);
    if (other !== null) return prefix + String.fromCharCode(other);

    // Adjacent characters: keep low's and go after the rest of low.
    if (lowCode !== -1) return prefix + low[i] + after(low.slice(i + 1));
  }

  return after(low);
}
