import { z } from 'zod';

export const SchedulerConfigSchema = z.object({
  // Overlap locks older than this are treated as abandoned
  overlapLockTimeoutMinutes: z.number().int().positive().default(1440),

  // How long SchedulerHost.stop() waits for in-flight runs
  shutdownTimeoutMs: z.number().int().min(0).default(10000),

  // Clock sampling period; each second is still ticked at most once
  tickIntervalMs: z.number().int().min(100).max(1000).default(1000),

  logTaskProgress: z.boolean().default(false),

  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type SchedulerConfig = z.infer<typeof SchedulerConfigSchema>;
