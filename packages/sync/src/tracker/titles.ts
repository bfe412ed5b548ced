/**
 * Title matching
 */

export type TitleMatching = 'exact' | 'normalized';

export const TITLE_MATCHING_MODES: readonly TitleMatching[] = ['exact', 'normalized'];

/**
 * Key two titles share when they count as the same download.
 * `normalized` trims, lowercases and collapses runs of whitespace, dots
 * and underscores, so `Show.X.S01E01` and `show x s01e01` collide.
 */
export function titleKey(title: string, matching: TitleMatching): string {
  if (matching === 'exact') {
    return title;
  }
  return title.trim().toLowerCase().replace(/[\s._]+/g, ' ').trim();
}
