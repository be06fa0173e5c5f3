export { parseDate, formatDate, addDays, isValidDate, daysUntil } from './date-parser.js';
export { guessTaskFields, stripPriorityMarkers } from './quick-entry-parser.js';
