export const CORE_VERSION = '0.1.0';

export * from './retention/types.js';
export * from './retention/weekday.js';
export * from './retention/classifier.js';
export * from './retention/config.js';
export * from './retention/summary.js';

export * from './inventory/stats.js';

export * from './report/index.js';
