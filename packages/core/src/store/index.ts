export { TaskStore } from './task-store.js';
export type { TaskStoreOptions, OpenResult } from './task-store.js';
export { normalizeListName } from './task-helpers.js';
