/**
 * Agent templates - role definitions handed to the coordinator at registration
 */

import { z } from 'zod';
import type { AgentSpec, TemplateProvider } from '../types.js';
import { CapabilitySchema } from '../utils/validation.js';
import { logger } from '../utils/logger.js';

const log = logger.child('templates');

export const AgentTemplateSchema = z.object({
  role: z.string().min(1).max(100),
  name: z.string().min(1).max(200),
  capabilities: z.array(CapabilitySchema).default([]),
  maxConcurrentTasks: z.number().int().min(1).default(1),
  prompt: z.string().default(''),
});

export type AgentTemplate = z.output<typeof AgentTemplateSchema>;

/**
 * In-memory provider over a caller-supplied set of templates
 */
export class StaticTemplateProvider implements TemplateProvider {
  private templates: Map<string, AgentTemplate> = new Map();

  constructor(templates: Array<z.input<typeof AgentTemplateSchema>> = []) {
    for (const template of templates) {
      this.register(template);
    }
  }

  register(input: z.input<typeof AgentTemplateSchema>): AgentTemplate {
    const template = AgentTemplateSchema.parse(input);
    if (this.templates.has(template.role)) {
      log.warn('Overwriting existing template', { role: template.role });
    }
    this.templates.set(template.role, template);
    return template;
  }

  has(role: string): boolean {
    return this.templates.has(role);
  }

  list(): AgentTemplate[] {
    return [...this.templates.values()];
  }

  createAgent(role: string, instanceId: string, projectPath: string = '.'): AgentSpec | null {
    const template = this.templates.get(role);
    if (!template) {
      return null;
    }

    return {
      id: instanceId,
      name: template.name,
      role: template.role,
      capabilities: [...template.capabilities],
      projectPath,
      maxConcurrentTasks: template.maxConcurrentTasks,
      prompt: template.prompt,
    };
  }
}
