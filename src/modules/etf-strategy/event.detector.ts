/**
 * ETF STRATEGY — Event Detector
 *
 * Flags "major event" news by case-sensitive substring match of every
 * keyword against every headline. One match per (title, keyword) hit; a
 * headline can contribute several, nothing is deduplicated across titles.
 */

import type { EventFlag, EventMatch } from './etf.types.js';

export function scanEvents(titles: readonly string[], keywords: readonly string[]): EventFlag {
  const matches: EventMatch[] = [];
  const uniqueKeywords = [...new Set(keywords)];

  for (const title of titles) {
    for (const keyword of uniqueKeywords) {
      if (keyword && title.includes(keyword)) {
        matches.push({ keyword, title });
      }
    }
  }

  return {
    hasEvent: matches.length > 0,
    matches,
  };
}

/**
 * Keyword to show next to a decision: the first one that matched
 */
export function primaryEventKeyword(flag: EventFlag): string | null {
  return flag.matches[0]?.keyword ?? null;
}
