export { parseDate, formatDate, addDays, todayString, isIsoDate, shiftDate } from './date-parser.js';
