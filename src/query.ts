// src/query.ts
import type { SearchCriteria } from "./types.js";

/**
 * Translate validated criteria into the upstream query vocabulary.
 * Parameter order is fixed so identical criteria always produce the same URL.
 */
export function toQueryParams(criteria: SearchCriteria): URLSearchParams {
  const params = new URLSearchParams();

  if (criteria.userId !== undefined) {
    params.append("userId", String(criteria.userId));
  }

  const title = criteria.titleContains?.trim();
  if (title) {
    params.append("title_like", title);
  }

  if (criteria.page !== undefined && criteria.size !== undefined) {
    params.append("_page", String(criteria.page));
    params.append("_limit", String(criteria.size));
  }

  if (criteria.sort !== undefined) {
    params.append("_sort", criteria.sort);
    params.append("_order", (criteria.order ?? "asc").toLowerCase());
  }

  return params;
}
