// Export all domain models

export * from './action-reference.js';
export * from './workflow.js';
export * from './summary.js';
