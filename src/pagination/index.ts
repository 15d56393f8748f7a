export { FIRST_PAGE, cursorFrom, resolveCursor, type PageCursor } from './cursor.js';
export { paginate } from './paginate.js';
