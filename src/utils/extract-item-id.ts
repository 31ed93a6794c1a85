/**
 * Item ID Extraction Utility
 *
 * Store items are linked as `/itm/<numeric id>`, optionally with a slug
 * segment in between (`/itm/some-title/123456789012`) and tracking query
 * parameters. The ID is 9-15 digits.
 */

import type { ItemIdentifier } from '../types/index.js';

export const ITEM_ID_PATTERN = /\/itm\/(?:[^/?#]+\/)?(\d{9,15})(?![\d])/;

/**
 * Extracts the item identifier from a link target.
 *
 * @example
 * extractItemId('https://shop.example.test/itm/123456789012?hash=abc')
 * // => '123456789012'
 *
 * @example
 * extractItemId('/itm/12345')
 * // => null (too short)
 */
export function extractItemId(href: string, pattern: RegExp = ITEM_ID_PATTERN): ItemIdentifier | null {
  const match = href.match(pattern);
  return match ? match[1] : null;
}

/**
 * Extracts item IDs from multiple links and returns a deduplicated set.
 */
export function extractItemIds(hrefs: Iterable<string>, pattern: RegExp = ITEM_ID_PATTERN): Set<ItemIdentifier> {
  const ids = new Set<ItemIdentifier>();

  for (const href of hrefs) {
    const id = extractItemId(href, pattern);
    if (id) {
      ids.add(id);
    }
  }

  return ids;
}
