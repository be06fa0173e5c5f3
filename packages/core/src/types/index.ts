export { Priority, PriorityName, PriorityRank, isPriority } from './priority.js';
export { DEFAULT_LIST } from './task.js';
export type { TaskId, ListName, Task, TaskUpdate } from './task.js';
export type { TaskResult, LoadResult, SaveResult, CopyResult } from './results.js';
