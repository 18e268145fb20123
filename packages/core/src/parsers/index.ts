export { parseDate, formatDate, isIsoDate, parseInstant, parseClockTime } from './date-parser.js';
