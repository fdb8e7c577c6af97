/**
 * Puzzle search.
 */

export {
  search,
  searchOrThrow,
  InvalidQueryError,
  SEARCH_FIELDS,
  type SearchField,
  type SearchOptions,
  type SearchHit,
  type SearchResult,
  type InvalidQuery,
  type InvalidQueryReason,
} from "./search.js";
