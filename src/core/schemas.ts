// Zod schemas for configuration validation

import { z } from 'zod';

/**
 * Summary output format
 */
export const OutputFormatSchema = z.enum(['text', 'json']);

/**
 * Contents of .pin-actions.yaml; every key is optional
 */
export const ConfigFileSchema = z.object({
  workflowsDir: z.string().min(1, 'workflowsDir must not be empty').optional(),
  jobs: z.number().int().positive('jobs must be a positive integer').optional(),
  backup: z.boolean().optional(),
  format: OutputFormatSchema.optional(),
  timeoutMs: z.number().int().positive('timeoutMs must be a positive integer').optional(),
  host: z.string().url('host must be a URL').optional()
}).strict();

/**
 * Fully merged run options
 */
export const PinOptionsSchema = z.object({
  workflowsDir: z.string().min(1, 'workflowsDir must not be empty'),
  jobs: z.number().int().positive('jobs must be a positive integer'),
  backup: z.boolean(),
  dryRun: z.boolean(),
  verbose: z.boolean(),
  format: OutputFormatSchema,
  timeoutMs: z.number().int().positive('timeoutMs must be a positive integer'),
  host: z.string().url('host must be a URL')
});

export type OutputFormat = z.infer<typeof OutputFormatSchema>;
export type ConfigFile = z.infer<typeof ConfigFileSchema>;
export type PinOptions = z.infer<typeof PinOptionsSchema>;
