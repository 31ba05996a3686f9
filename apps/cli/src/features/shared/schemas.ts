import { z } from 'zod';

export const JsonFlagSchema = z.object({
  json: z.boolean().optional(),
});

/**
 * Apply command options
 */
export const ApplyCommandOptionsSchema = JsonFlagSchema.extend({
  rules: z.string({ required_error: 'A rules file is required (--rules <file>)' }).min(1),
  output: z.string().min(1).optional(),
  workers: z.coerce.number().int().positive({ message: '--workers must be a positive integer' }).optional(),
  sheet: z.string().min(1).optional(),
});

/**
 * Inspect command options
 */
export const InspectCommandOptionsSchema = JsonFlagSchema;
