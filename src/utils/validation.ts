/**
 * Input validation utilities using Zod
 */

import { z } from 'zod';
import { TaskPriority } from '../types.js';
import { ValidationError } from '../errors.js';

// Accepts the ordinal (1-4) or its name ("HIGH", case-insensitive)
export const TaskPrioritySchema = z.union([
  z.literal(TaskPriority.LOW),
  z.literal(TaskPriority.MEDIUM),
  z.literal(TaskPriority.HIGH),
  z.literal(TaskPriority.CRITICAL),
  z.string()
    .transform(name => name.toUpperCase())
    .pipe(z.enum(['LOW', 'MEDIUM', 'HIGH', 'CRITICAL']))
    .transform(name => TaskPriority[name]),
]);

export const IdSchema = z.string().min(1).max(200);
export const CapabilitySchema = z.string().min(1).max(100);

// Sets on the wire, arrays in memory: duplicates collapse, order is kept
const IdSetSchema = z.array(IdSchema).transform(ids => [...new Set(ids)]);
const CapabilitySetSchema = z.array(CapabilitySchema).transform(tags => [...new Set(tags)]);

export const CreateTaskInputSchema = z.object({
  title: z.string().min(1).max(500),
  description: z.string().max(100_000).default(''),
  priority: TaskPrioritySchema.default(TaskPriority.MEDIUM),
  dependencies: IdSetSchema.default([]),
  requiredCapabilities: CapabilitySetSchema.default([]),
});

export const RegisterAgentInputSchema = z.object({
  id: IdSchema,
  name: z.string().min(1).max(200),
  role: z.string().min(1).max(100),
  capabilities: CapabilitySetSchema.default([]),
  projectPath: z.string().min(1).default('.'),
  maxConcurrentTasks: z.number().int().min(1).max(100).default(1),
  prompt: z.string().optional(),
});

export const PostMessageInputSchema = z.object({
  fromAgent: IdSchema,
  toAgent: IdSchema,
  messageType: z.string().min(1).max(100),
  content: z.string().max(1_000_000),
  taskId: IdSchema.optional(),
});

export type CreateTaskInput = z.input<typeof CreateTaskInputSchema>;
export type NewTask = z.output<typeof CreateTaskInputSchema>;
export type RegisterAgentInput = z.input<typeof RegisterAgentInputSchema>;
export type NewAgent = z.output<typeof RegisterAgentInputSchema>;
export type PostMessageInput = z.input<typeof PostMessageInputSchema>;

// Validation helper
export function validate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): { success: true; data: T } | { success: false; errors: string[] } {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`),
  };
}

/**
 * Parse or raise a ValidationError naming the subject
 */
export function parseInput<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  subject: string
): T {
  const result = validate(schema, data);
  if (!result.success) {
    throw new ValidationError(subject, result.errors);
  }
  return result.data;
}
