import type { MemoryHit } from "../../schemas/store";

const MS_PER_DAY = 86_400_000;

export function cosineSimilarity(left: number[], right: number[]): number {
  if (left.length === 0 || left.length !== right.length) {
    return 0;
  }

  let dot = 0;
  let leftNorm = 0;
  let rightNorm = 0;
  for (let index = 0; index < left.length; index += 1) {
    const a = left[index] ?? 0;
    const b = right[index] ?? 0;
    dot += a * b;
    leftNorm += a * a;
    rightNorm += b * b;
  }

  if (leftNorm === 0 || rightNorm === 0) {
    return 0;
  }
  return dot / (Math.sqrt(leftNorm) * Math.sqrt(rightNorm));
}

/**
 * Maps cosine from [-1, 1] onto [0, 1].
 */
export function rescaledCosine(left: number[], right: number[]): number {
  return clamp01((cosineSimilarity(left, right) + 1) / 2);
}

export function clamp01(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}

export function daysBetween(earlier: string, now: Date): number {
  const parsed = Date.parse(earlier);
  if (!Number.isFinite(parsed)) {
    return 0;
  }
  return Math.max(0, (now.getTime() - parsed) / MS_PER_DAY);
}

/**
 * `exp(-days / decayDays)`; unparseable timestamps count as brand new.
 */
export function temporalScore(createdAt: string, now: Date, decayDays: number): number {
  if (decayDays <= 0) {
    return 1;
  }
  return clamp01(Math.exp(-daysBetween(createdAt, now) / decayDays));
}

/**
 * Vector score of a search hit against the query: cosine over the returned
 * vector when present, else the score the store reported.
 */
export function hitSimilarity(query: number[], hit: MemoryHit): number {
  if (hit.vector && hit.vector.length > 0) {
    return clamp01(cosineSimilarity(query, hit.vector));
  }
  return clamp01(hit.score ?? 0);
}
