// Name similarity for "did you mean" suggestions

/**
 * Jaro similarity between two strings, from 0 (nothing in common) to 1 (equal).
 */
export function jaroSimilarity(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);

  if (left.length === 0 && right.length === 0) return 1;
  if (left.length === 0 || right.length === 0) return 0;

  const window = Math.max(Math.floor(Math.max(left.length, right.length) / 2) - 1, 0);
  const leftMatched = new Array<boolean>(left.length).fill(false);
  const rightMatched = new Array<boolean>(right.length).fill(false);

  let matches = 0;
  for (let i = 0; i < left.length; i++) {
    const from = Math.max(0, i - window);
    const to = Math.min(i + window + 1, right.length);
    for (let j = from; j < to; j++) {
      if (rightMatched[j] || left[i] !== right[j]) continue;
      leftMatched[i] = true;
      rightMatched[j] = true;
      matches++;
      break;
    }
  }

  if (matches === 0) return 0;

  let halfTranspositions = 0;
  let k = 0;
  for (let i = 0; i < left.length; i++) {
    if (!leftMatched[i]) continue;
    while (!rightMatched[k]) k++;
    if (left[i] !== right[k]) halfTranspositions++;
    k++;
  }
  const transpositions = halfTranspositions / 2;

  return (matches / left.length + matches / right.length + (matches - transpositions) / matches) / 3;
}

export const SUGGESTION_THRESHOLD = 0.8;

/**
 * The candidate most similar to `attempted`, if any scores above the
 * threshold. Ties go to the earliest candidate.
 */
export function suggestName(attempted: string, candidates: readonly string[]): string | undefined {
  let best: string | undefined;
  let bestScore = SUGGESTION_THRESHOLD;

  for (const candidate of candidates) {
    const score = jaroSimilarity(candidate, attempted);
    if (score > bestScore) {
      best = candidate;
      bestScore = score;
    }
  }

  return best;
}
