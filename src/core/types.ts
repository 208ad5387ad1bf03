import { z } from 'zod';

// ===== Configuration =====

const SOURCE_EXTENSIONS = ['.ts', '.tsx', '.js', '.jsx', '.mjs', '.cjs', '.mts', '.cts'];

const thresholdPercent = z.number().min(0).max(100);

export const HealthPulseConfigSchema = z.object({
  paths: z.object({
    /** Directory the code health and security monitors scan */
    sourceDir: z.string().default('src'),
    logsDir: z.string().default('logs/autonomous_agents'),
    dataDir: z.string().default('data/improvement_plans'),
  }).default({}),
  orchestrator: z.object({
    parallel: z.boolean().default(false),
    /** Interval between runs in `watch` mode */
    intervalSeconds: z.number().int().min(1).default(3600),
  }).default({}),
  monitors: z.object({
    codeHealth: z.object({
      intervalSeconds: z.number().int().min(1).default(1800),
      extensions: z.array(z.string()).default(SOURCE_EXTENSIONS),
    }).default({}),
    performance: z.object({
      intervalSeconds: z.number().int().min(1).default(900),
      thresholds: z.object({
        cpu: thresholdPercent.default(80),
        memory: thresholdPercent.default(80),
        disk: thresholdPercent.default(90),
      }).default({}),
      logSizeLimitMb: z.number().min(0).default(100),
      logDirs: z.array(z.string()).default(['logs']),
      diskPath: z.string().default('/'),
      cpuSampleMs: z.number().int().min(0).max(10_000).default(1000),
    }).default({}),
    security: z.object({
      intervalSeconds: z.number().int().min(1).default(3600),
      secretsFile: z.string().default('.env'),
    }).default({}),
    dependencies: z.object({
      intervalSeconds: z.number().int().min(1).default(86_400),
      manifestFiles: z.array(z.string()).default(['package.json']),
    }).default({}),
  }).default({}),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    pretty: z.boolean().default(true),
    file: z.string().optional(),
  }).default({}),
});

export type HealthPulseConfig = z.infer<typeof HealthPulseConfigSchema>;

/** Partial config accepted as overrides, at any depth */
export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends unknown[] ? T[K] : T[K] extends object ? DeepPartial<T[K]> : T[K];
};

export type HealthPulseConfigOverrides = DeepPartial<HealthPulseConfig>;
