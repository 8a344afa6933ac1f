/**
 * Edit distance over code points, two-row Wagner-Fischer.
 */
export function levenshteinDistance(a: string, b: string): number {
  if (a === b) return 0;

  const aChars = [...a];
  const bChars = [...b];
  if (aChars.length === 0) return bChars.length;
  if (bChars.length === 0) return aChars.length;

  const [short, long] = aChars.length <= bChars.length ? [aChars, bChars] : [bChars, aChars];

  let prevRow = Array.from({ length: short.length + 1 }, (_, i) => i);
  let currRow = new Array<number>(short.length + 1).fill(0);

  for (let j = 1; j <= long.length; j++) {
    currRow[0] = j;
    for (let i = 1; i <= short.length; i++) {
      const cost = short[i - 1] === long[j - 1] ? 0 : 1;
      currRow[i] = Math.min(
        prevRow[i] + 1,
        currRow[i - 1] + 1,
        prevRow[i - 1] + cost,
      );
    }
    [prevRow, currRow] = [currRow, prevRow];
  }

  return prevRow[short.length];
}

/** 1 = identical, 0 = nothing in common. */
export function similarityRatio(a: string, b: string): number {
  const maxLen = Math.max([...a].length, [...b].length);
  if (maxLen === 0) return 1;
  return 1 - levenshteinDistance(a, b) / maxLen;
}
