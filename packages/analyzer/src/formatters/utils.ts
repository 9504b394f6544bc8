/**
 * Formatter Utilities
 */

import type { Diagnostic } from '@mapcheck/core';

/**
 * `Source -> Destination.Member`, or just the pair for declaration-level findings
 */
export function formatSubject(diagnostic: Diagnostic): string {
  const pair = `${diagnostic.sourceType} -> ${diagnostic.destType}`;
  return diagnostic.member ? `${pair}.${diagnostic.member}` : pair;
}
