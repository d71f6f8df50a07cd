// Export all domain models

export * from './types.js';
export * from './check.js';
export * from './report.js';
