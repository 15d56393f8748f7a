import type { Page } from '../types/resource.types.js';
import { FIRST_PAGE, cursorFrom, type PageCursor } from './cursor.js';

/**
 * Walks a list endpoint from the first page, yielding each page's results
 * until a page has no `next` link.
 *
 * ```ts
 * for await (const models of paginate(cursor => client.models.list(cursor))) { ... }
 * ```
 */
export async function* paginate<T>(
  list: (cursor: PageCursor) => Promise<Page<T>>,
): AsyncGenerator<T[], void, undefined> {
  let cursor: PageCursor = FIRST_PAGE;
  while (true) {
    const page = await list(cursor);
    yield page.results;
    if (!page.next) return;
    cursor = cursorFrom(page.next);
  }
}
