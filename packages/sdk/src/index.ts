export * from './types.js';
export * from './schemas/agent-response.js';
export * from './schemas/task.js';
export * from './schemas/sites.js';
