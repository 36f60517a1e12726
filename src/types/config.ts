// Runtime configuration for the CLI
// Sources: CLI flags > DMESG_TRIAGE_* environment variables > defaults

import { z } from 'zod';

export const TriageConfigSchema = z.object({
  // Input
  file: z.string().min(1).optional(),
  command: z.string().min(1).default('dmesg'),

  // Rules
  rules: z.string().min(1).optional(),

  // Display
  pager: z.string().min(1).default('less -R'),

  // Logging
  logFile: z.string().min(1).optional(),
  verbose: z.boolean().default(false),
});

export type TriageConfig = z.infer<typeof TriageConfigSchema>;
