export {
  DEFAULT_TIMEZONE, isValidTimezone, resolveTimezone,
  dayWindow, localDate, localInstant, isWithin,
} from './day-window.js';
export type { DayWindow } from './day-window.js';
export { classifyTask, isOverdue, isCompletedToday } from './classifier.js';
