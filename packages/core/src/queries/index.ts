// Task helpers
export {
  generateId,
  normalizeTags,
  serializeTags,
  deserializeTags,
} from './task-helpers.js';

// Request context
export { resolveContext } from './context.js';
export type { ResolvedContext } from './context.js';

// Task queries
export {
  MAX_TITLE_LENGTH,
  MAX_DESCRIPTION_LENGTH,
  validateDueBy,
  createTask,
  updateTask,
  completeTask,
  reopenTask,
  getTask,
  deleteTask,
  getStats,
} from './task-queries.js';
export type {
  DueByInput,
  PositionHint,
  CreateTaskInput,
  UpdateTaskInput,
  TaskStats,
} from './task-queries.js';

// Views
export {
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
  parseView,
  buildViewFilter,
  validatePaging,
  listPage,
  listByView,
  listOverdue,
} from './view-queries.js';
export type { ListOptions, TaskPage } from './view-queries.js';

// Moves
export { validateMoveRequest, moveTask } from './move-task.js';
export type { MoveRequest, MoveStrategy, MoveResult } from './move-task.js';

// Config queries
export {
  ConfigKey,
  CONFIG_KEYS,
  isConfigKey,
  getConfig,
  setConfig,
  setSetting,
  getDefaultUser,
  getDefaultTimezone,
} from './config-queries.js';
