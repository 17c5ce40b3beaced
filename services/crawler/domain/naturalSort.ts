/**
 * Natural ordering for entry and type names, so that "1.2" sorts before
 * "1.10" and numbered names come before plain words.
 */

const RUN_PATTERN = /\d+|\D+/g;
const DIGITS = /^\d+$/;

function splitRuns(name: string): string[] {
  return name.match(RUN_PATTERN) ?? [];
}

function isNumeric(run: string): boolean {
  return DIGITS.test(run);
}

function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function compareCaseInsensitive(a: string, b: string): number {
  return compareStrings(a.toLowerCase(), b.toLowerCase()) || compareStrings(a, b);
}

function compareNumbers(a: string, b: string): number {
  const x = BigInt(a);
  const y = BigInt(b);
  if (x === y) return 0;
  return x < y ? -1 : 1;
}

function compareRuns(a: string, b: string): number {
  const aNumeric = isNumeric(a);
  const bNumeric = isNumeric(b);
  if (aNumeric && bNumeric) return compareNumbers(a, b);
  if (aNumeric) return -1;
  if (bNumeric) return 1;
  return compareStrings(a, b);
}

/**
 * Insert zero runs before the last run until the sequence has `length` runs
 */
function pad(runs: string[], length: number): string[] {
  if (runs.length >= length) return runs;
  const zeros = new Array<string>(length - runs.length).fill('0');
  return [...runs.slice(0, -1), ...zeros, ...runs.slice(-1)];
}

/**
 * Comparator for Array.prototype.sort
 */
export function naturalCompare(a: string, b: string): number {
  const aDigit = /^\d/.test(a);
  const bDigit = /^\d/.test(b);

  if (!aDigit && !bDigit) {
    return compareCaseInsensitive(a, b);
  }

  const aRuns = splitRuns(a);
  const bRuns = splitRuns(b);

  // A name made of a single run sorts after any multi-run name
  if (aRuns.length <= 1 || bRuns.length <= 1) {
    if (aRuns.length > 1) return -1;
    if (bRuns.length > 1) return 1;
    return aDigit && bDigit ? compareNumbers(a, b) || compareStrings(a, b) : compareRuns(a, b) || compareCaseInsensitive(a, b);
  }

  const length = Math.max(aRuns.length, bRuns.length);
  const left = pad(aRuns, length);
  const right = pad(bRuns, length);

  for (let i = 0; i < length; i++) {
    const order = compareRuns(left[i], right[i]);
    if (order !== 0) return order;
  }

  return compareCaseInsensitive(a, b);
}

/**
 * Sort items in place by a name, naturally
 */
export function sortByName<T>(items: T[], nameOf: (item: T) => string): T[] {
  return items.sort((x, y) => naturalCompare(nameOf(x), nameOf(y)));
}
