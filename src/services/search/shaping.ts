/**
 * Result shaping: store hits to the public result types.
 *
 * @module services/search/shaping
 */

import type { ContentSearchResult, Highlights, MetadataSearchResult } from '../../models/search.js';
import type { StoreHit } from '../storage/types.js';

function toHighlights(highlight: StoreHit['highlight']): Highlights {
  const highlights: Highlights = {};
  for (const [field, fragments] of Object.entries(highlight)) {
    if (fragments && fragments.length > 0) {
      highlights[field] = [...fragments];
    }
  }
  return highlights;
}

export function toContentResult(hit: StoreHit): ContentSearchResult {
  return {
    score: hit.score,
    contract_name: hit.page.contract_name,
    page_id: hit.page.page_id,
    text: hit.page.text,
    highlights: toHighlights(hit.highlight),
  };
}

/**
 * metadata_info is the stored metadata as-is; vectors never leave the store.
 */
export function toMetadataResult(hit: StoreHit): MetadataSearchResult {
  return {
    ...toContentResult(hit),
    metadata_info: hit.page.document_metadata ? { ...hit.page.document_metadata } : null,
  };
}
