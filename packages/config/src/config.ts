import { z } from 'zod';

// ============================================================================
// Helpers
// ============================================================================

export const delimiterSchema = z.preprocess((value) => {
  if (value === '\\t' || value === 'tab') {
    return '\t';
  }
  return value;
}, z.string().length(1));

export const measurementColumnsSchema = z.enum(['concurrency-throughput', 'concurrency-latency', 'throughput-latency']);

export const fitMethodSchema = z.enum(['refined', 'linearized']);

export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);

const positiveLevelsSchema = z.array(z.number().positive()).max(1_000);

// ============================================================================
// CONFIG SCHEMA (config.json)
// ============================================================================

export const telemetrySchema = z
  .object({
    logLevel: logLevelSchema.default('warn'),
    traceErrors: z.boolean().default(false),
    prettyPrint: z.boolean().optional(),
  })
  .strict();

export type TelemetryConfig = z.infer<typeof telemetrySchema>;

export const fitSchema = z
  .object({
    method: fitMethodSchema.default('refined'),
    maxIterations: z.number().int().min(1).max(10_000).default(100),
    tolerance: z.number().positive().max(1e-3).default(1e-10),
  })
  .strict();

export type FitConfig = z.infer<typeof fitSchema>;

export const inputSchema = z
  .object({
    columns: measurementColumnsSchema.default('concurrency-throughput'),
    delimiter: delimiterSchema.default(','),
    hasHeader: z.boolean().default(false),
  })
  .strict();

export type InputConfig = z.infer<typeof inputSchema>;

export const reportSchema = z
  .object({
    precision: z.number().int().min(0).max(12).default(4),
    concurrencyLevels: positiveLevelsSchema.default([1, 2, 4, 8, 16, 32, 64]),
    throughputs: positiveLevelsSchema.default([]),
    latencies: positiveLevelsSchema.default([]),
  })
  .strict();

export type ReportConfig = z.infer<typeof reportSchema>;

// ============================================================================
// MAIN CONFIG SCHEMA
// ============================================================================

export const configSchema = z
  .object({
    $schema: z.string().optional(),
    $comment: z.string().optional(),
    telemetry: telemetrySchema.default({ logLevel: 'warn', traceErrors: false }),
    fit: fitSchema.default({ method: 'refined', maxIterations: 100, tolerance: 1e-10 }),
    input: inputSchema.default({ columns: 'concurrency-throughput', delimiter: ',', hasHeader: false }),
    report: reportSchema.default({
      precision: 4,
      concurrencyLevels: [1, 2, 4, 8, 16, 32, 64],
      throughputs: [],
      latencies: [],
    }),
  })
  .strict();

export type ConfigSchema = z.infer<typeof configSchema>;
