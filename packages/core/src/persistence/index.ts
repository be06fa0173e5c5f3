export { JsonTaskFile, serializeTasks, deserializeTasks } from './json-task-file.js';
export type { TaskPersistence } from './task-persistence.js';
export { taskToRecord } from './task-record.js';
