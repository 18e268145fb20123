export { Priority, PriorityName, PriorityRank, isPriority } from './priority.js';
export type { TaskId, OwnerId, ProjectId, TimeMode, DueBy, CompletedOn, Task, RequestContext } from './task.js';
export type { TaskError, TaskResult, DataResult } from './results.js';
export {
  isSuccess, isError, describeError,
  invalidArgument, notFound, forbidden, conflict,
} from './results.js';
export type { View, ViewName, Classification, Bucket } from './view.js';
export { VIEW_NAMES } from './view.js';
