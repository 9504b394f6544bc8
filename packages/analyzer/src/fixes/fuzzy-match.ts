import { distance } from 'fastest-levenshtein';
import type { Member } from '@mapcheck/core';
import type { FuzzyMatchOptions } from '../types/index.js';

export interface FuzzyCandidate {
  member: Member;
  distance: number;
}

/**
 * Closest member name by case-insensitive edit distance. Ties keep the
 * first candidate in declaration order.
 */
export function findClosestMember(
  name: string,
  candidates: Member[],
  options: FuzzyMatchOptions
): FuzzyCandidate | undefined {
  const target = name.toLowerCase();
  let best: FuzzyCandidate | undefined;

  for (const member of candidates) {
    const candidate = member.name.toLowerCase();
    if (Math.abs(candidate.length - target.length) > options.maxLengthDifference) continue;

    const d = distance(candidate, target);
    if (d > options.maxDistance) continue;
    if (!best || d < best.distance) {
      best = { member, distance: d };
    }
  }

  return best;
}
