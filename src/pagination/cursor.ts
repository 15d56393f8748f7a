import { InvalidArgumentError } from '../errors/argument.js';

/**
 * Position in a list endpoint. `first` requests the endpoint's base path;
 * `cursor` requests exactly the opaque target a previous page handed out
 * in its `next` or `previous` field.
 */
export type PageCursor =
  | { readonly kind: 'first' }
  | { readonly kind: 'cursor'; readonly target: string };

export const FIRST_PAGE: PageCursor = Object.freeze({ kind: 'first' });

/**
 * Wraps a page link as a cursor. A null or empty link means there is no
 * further page, so asking for it is a caller error.
 */
export function cursorFrom(target: string | null | undefined): PageCursor {
  if (target === null || target === undefined || target === '') {
    throw new InvalidArgumentError('cursor cannot be empty: there is no page to fetch');
  }
  return { kind: 'cursor', target };
}

/** Path or URL to request for `cursor`, given the endpoint's base path. */
export function resolveCursor(cursor: PageCursor, basePath: string): string {
  if (typeof cursor !== 'object' || cursor === null) {
    throw new InvalidArgumentError('cursor cannot be empty: there is no page to fetch');
  }
  switch (cursor.kind) {
    case 'first':
      return basePath;
    case 'cursor':
      if (typeof cursor.target !== 'string' || cursor.target === '') {
        throw new InvalidArgumentError('cursor cannot be empty: there is no page to fetch');
      }
      return cursor.target;
    default: {
      const _exhaustive: never = cursor;
      throw new InvalidArgumentError(`Unknown cursor: ${JSON.stringify(_exhaustive)}`);
    }
  }
}
