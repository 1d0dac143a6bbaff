export * from './errors.js';
export * from './patterns.js';
export * from './url-utils.js';
export * from './data-types/index.js';
export * from './value-tree.js';
export * from './comparator.js';
export * from './jsonpath.js';
export * from './response.js';
export * from './sites.js';
export * from './network/index.js';
export * from './evaluators/index.js';
export * from './tasks.js';
export * from './evaluate.js';
export * from './report.js';
