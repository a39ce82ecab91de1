export const DEFAULT_MIN_PREFIX_SCORE = 3;

export interface ModelMatch {
  model: string;
  score: number;
}

export function commonPrefixLength(a: string, b: string): number {
  const minLen = Math.min(a.length, b.length);
  let len = 0;
  while (len < minLen && a.charAt(len).toLowerCase() === b.charAt(len).toLowerCase()) {
    len++;
  }
  return len;
}

// Pure prefix scoring: "gpt4o" only shares "gpt" with "gpt-4o". Edit distance
// would do better on typos in the middle of a name, but callers rely on this
// exact ranking today.
export function findClosestModel(
  requestedModel: string,
  candidates: readonly string[],
  minScore: number = DEFAULT_MIN_PREFIX_SCORE,
): ModelMatch | undefined {
  let best: ModelMatch | undefined;
  for (const candidate of candidates) {
    const score = commonPrefixLength(requestedModel, candidate);
    if (score > (best?.score ?? 0)) {
      best = { model: candidate, score };
    }
  }

  if (!best || best.score < minScore) return undefined;
  return best;
}
