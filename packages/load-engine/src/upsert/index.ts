export { classifyRow, idColumnOf, prepareRow } from './row-classifier.js';
export type { ClassifierContext, ClassifiedRow, PreparedRow } from './row-classifier.js';
export { loadTable } from './table-loader.js';
export type { TableLoaderOptions } from './table-loader.js';
