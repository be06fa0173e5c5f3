export { projectTasks, viewList, toTaskView } from './task-projection.js';
export type { TaskView, StatusLabel, ShowFilter } from './task-projection.js';
