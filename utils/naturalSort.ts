/**
 * Natural ordering of file names: runs of digits compare by numeric value,
 * so "track2.mp3" sorts before "track10.mp3".
 */

const DIGIT_RUN = /(\d+)/;

/**
 * Split a name into alternating text and digit segments.
 * Even positions are text (possibly empty), odd positions are digit runs.
 */
export function naturalSortKey(name: string): string[] {
  return name.toLowerCase().split(DIGIT_RUN);
}

// Digit runs may exceed Number.MAX_SAFE_INTEGER, so compare them as strings
function compareDigitRuns(a: string, b: string): number {
  const trimmedA = a.replace(/^0+/, '');
  const trimmedB = b.replace(/^0+/, '');
  if (trimmedA.length !== trimmedB.length) {
    return trimmedA.length - trimmedB.length;
  }
  return compareText(trimmedA, trimmedB);
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function naturalCompare(a: string, b: string): number {
  const keyA = naturalSortKey(a);
  const keyB = naturalSortKey(b);
  const length = Math.min(keyA.length, keyB.length);

  for (let i = 0; i < length; i++) {
    const result = i % 2 === 1
      ? compareDigitRuns(keyA[i], keyB[i])
      : compareText(keyA[i], keyB[i]);
    if (result !== 0) {
      return result;
    }
  }

  if (keyA.length !== keyB.length) {
    return keyA.length - keyB.length;
  }

  // "01" and "1" are equal above; keep the order stable by the raw name
  return compareText(a, b);
}

export function naturalSort(names: readonly string[]): string[] {
  return [...names].sort(naturalCompare);
}
