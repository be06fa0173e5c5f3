// Types
export { Priority, PriorityName, PriorityRank, isPriority, DEFAULT_LIST } from './types/index.js';
export type { TaskId, ListName, Task, TaskUpdate } from './types/index.js';
export type { TaskResult, LoadResult, SaveResult, CopyResult } from './types/index.js';

// Errors
export { CorruptStoreError, IOError } from './errors.js';
export type { ValidationError } from './errors.js';

// Parsers
export { parseDate, formatDate, addDays, isValidDate, daysUntil, guessTaskFields, stripPriorityMarkers } from './parsers/index.js';

// Store
export { TaskStore, normalizeListName } from './store/index.js';
export type { TaskStoreOptions, OpenResult } from './store/index.js';

// Projection
export { projectTasks, viewList, toTaskView } from './view/index.js';
export type { TaskView, StatusLabel, ShowFilter } from './view/index.js';

// Persistence
export { JsonTaskFile, serializeTasks, deserializeTasks, taskToRecord } from './persistence/index.js';
export type { TaskPersistence } from './persistence/index.js';
