// nearest returns the element of candidates closest to x by edit
// distance, or '' if none is within half the length of x.
// Ties go to the earlier candidate.
export function nearest(x: string, candidates: Iterable<string>): string {
  let best = '';
  let bestD = (x.length + 1) / 2;
  for (const c of candidates) {
    if (c === x) {
      continue;
    }
    const d = editDistance(x, c, bestD);
    if (d < bestD) {
      bestD = d;
      best = c;
    }
  }
  return best;
}

// editDistance returns the Levenshtein distance between x and y.
// Once every entry of a row exceeds max, it returns that row's minimum,
// a value greater than max but not necessarily the exact distance.
export function editDistance(x: string, y: string, max: number = Infinity): number {
  if (Math.abs(x.length - y.length) > max) {
    return Math.abs(x.length - y.length);
  }

  let prev = Array.from({ length: y.length + 1 }, (_, j) => j);
  for (let i = 1; i <= x.length; i++) {
    const cur = [i];
    let rowMin = i;
    for (let j = 1; j <= y.length; j++) {
      const cost = x[i - 1] === y[j - 1] ? 0 : 1;
      cur[j] = Math.min(prev[j - 1] + cost, prev[j] + 1, cur[j - 1] + 1);
      rowMin = Math.min(rowMin, cur[j]);
    }
    if (rowMin > max) {
      return rowMin;
    }
    prev = cur;
  }
  return prev[y.length];
}
