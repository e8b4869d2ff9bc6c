/**
 * Agents module exports
 */

export { AgentRegistry, cloneAgent } from './registry.js';
export { StaticTemplateProvider, AgentTemplateSchema, type AgentTemplate } from './templates.js';
