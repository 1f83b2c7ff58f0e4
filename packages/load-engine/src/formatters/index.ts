/**
 * Formatters
 */

export { formatRunReport } from './run-report-formatter.js';
