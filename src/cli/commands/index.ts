/**
 * CLI commands index
 */

export { createPlanCommand } from './plan.js';
export { createConfigCommand } from './config.js';
