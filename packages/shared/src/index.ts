export * from './types/carbon.js';
export * from './types/energy.js';
export * from './types/training.js';
export * from './types/budget.js';
export * from './types/scheduler.js';
export * from './types/report.js';
export * from './types/config.js';

export * from './schemas/carbon.schema.js';
export * from './schemas/training.schema.js';
export * from './schemas/budget.schema.js';
export * from './schemas/config.schema.js';
export * from './schemas/report.schema.js';

export * from './constants.js';
export * from './utils/index.js';
