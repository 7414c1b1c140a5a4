export { OnceCache, createOnceKey } from './once-cache';
export type { OnceKey } from './once-cache';
export { deepFreeze } from './freeze';
