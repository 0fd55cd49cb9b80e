import { DEFAULT_PAGE, MAX_PAGE_LIMIT, PageRequest } from './common.types';
import { InvalidPageError } from './errors';

/**
 * Apply page defaults and reject out-of-range values (never clamped)
 */
export function resolvePage(page: Partial<PageRequest> = {}): PageRequest {
  const limit = page.limit ?? DEFAULT_PAGE.limit;
  const offset = page.offset ?? DEFAULT_PAGE.offset;

  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_PAGE_LIMIT) {
    throw new InvalidPageError(
      `limit must be an integer between 1 and ${MAX_PAGE_LIMIT}, got ${limit}`,
      page,
    );
  }

  if (!Number.isInteger(offset) || offset < 0) {
    throw new InvalidPageError(
      `offset must be a non-negative integer, got ${offset}`,
      page,
    );
  }

  return { limit, offset };
}
