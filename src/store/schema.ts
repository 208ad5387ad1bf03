import { z } from 'zod';

const score = z.number().min(0).max(100);

/**
 * Shape checked when a persisted aggregate report is read back. Per-agent
 * outcomes are kept opaque; only the aggregate is relied on.
 */
export const StoredReportSchema = z.object({
  runId: z.string(),
  startedAt: z.string(),
  completedAt: z.string(),
  durationSeconds: z.number(),
  mode: z.enum(['sequential', 'parallel']),
  agents: z.record(z.string(), z.unknown()),
  aggregate: z.object({
    scores: z.object({
      code_health: score,
      performance: score,
      security: score,
      dependencies: score,
    }),
    overallScore: score,
    status: z.enum(['healthy', 'warning', 'critical']),
  }),
});

export type StoredReport = z.infer<typeof StoredReportSchema>;
