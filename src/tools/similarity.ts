// Fuzzy line matching for edit_file hints

/** Sørensen-Dice coefficient on character bigrams. Returns 0–1. */
export function bigramSimilarity(a: string, b: string): number {
  if (a.length < 2 || b.length < 2) return a === b ? 1 : 0;
  const bigrams = (s: string): Map<string, number> => {
    const m = new Map<string, number>();
    for (let i = 0; i < s.length - 1; i++) {
      const bi = s.slice(i, i + 2);
      m.set(bi, (m.get(bi) ?? 0) + 1);
    }
    return m;
  };
  const aB = bigrams(a);
  const bB = bigrams(b);
  let overlap = 0;
  for (const [k, v] of aB) {
    overlap += Math.min(v, bB.get(k) ?? 0);
  }
  return (2 * overlap) / (a.length - 1 + (b.length - 1));
}

/**
 * Up to `limit` candidates scoring at least `cutoff` against `needle`, best
 * first. Blank candidates and repeats are ignored.
 */
export function closestMatches(needle: string, candidates: string[], limit = 3, cutoff = 0.6): string[] {
  const target = needle.trim();
  const seen = new Set<string>();
  const scored: Array<{ text: string; score: number }> = [];

  for (const candidate of candidates) {
    const text = candidate.trim();
    if (!text || seen.has(text)) continue;
    seen.add(text);
    const score = bigramSimilarity(target, text);
    if (score >= cutoff) {
      scored.push({ text: candidate, score });
    }
  }

  return scored
    .sort((x, y) => y.score - x.score)
    .slice(0, limit)
    .map(s => s.text);
}
