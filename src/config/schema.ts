import { z } from 'zod';
import { canonicalIdentity } from '../meters/identity.js';

// --- Sub-schemas ---

export const BleSchema = z.object({
  driver: z.enum(['auto', 'noble', 'node-ble']).default('auto'),
  adapter: z
    .string()
    .regex(/^hci\d+$/, 'Must be a BlueZ adapter name (e.g., hci0)')
    .optional()
    .nullable(),
});

const MeterIdSchema = z
  .union([z.string(), z.number()])
  .transform((v, ctx) => {
    const id = canonicalIdentity(v);
    if (id === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Must be the meter serial number (digits only, at most 16777215)',
      });
      return z.NEVER;
    }
    return id;
  });

export const MeterSchema = z.object({
  id: MeterIdSchema,
  type: z.enum(['water', 'gas']),
  name: z.string().min(1, 'Meter name is required'),
});

export const ScanSchema = z
  .object({
    restart_initial_ms: z.number().int().min(100).max(60_000).default(1_000),
    restart_max_ms: z.number().int().min(1_000).max(600_000).default(60_000),
    stop_timeout_ms: z.number().int().min(100).max(60_000).default(5_000),
  })
  .refine((s) => s.restart_max_ms >= s.restart_initial_ms, {
    message: 'restart_max_ms must be at least restart_initial_ms',
  });

export const MqttExporterSchema = z.object({
  type: z.literal('mqtt'),
  broker_url: z.string().min(1, 'Broker URL is required'),
  topic: z.string().min(1).default('elehant'),
  qos: z.union([z.literal(0), z.literal(1), z.literal(2)]).default(1),
  retain: z.boolean().default(true),
  username: z.string().optional(),
  password: z.string().optional(),
  client_id: z.string().min(1).default('elehant-meter-sync'),
});

export const WebhookExporterSchema = z.object({
  type: z.literal('webhook'),
  url: z.string().url('Must be a valid URL'),
  method: z.enum(['POST', 'PUT']).default('POST'),
  headers: z.record(z.string()).default({}),
  timeout: z.number().int().positive().default(10_000),
});

export const ExporterEntrySchema = z.discriminatedUnion('type', [
  MqttExporterSchema,
  WebhookExporterSchema,
]);

export const RuntimeSchema = z.object({
  publish_interval: z.number().int().min(5).max(86_400).default(60),
  dry_run: z.boolean().default(false),
  log_level: z.enum(['trace', 'debug', 'info', 'warn', 'error']).optional(),
  debug: z.boolean().default(false),
});

export const AppConfigSchema = z
  .object({
    version: z.literal(1),
    ble: BleSchema.default({ driver: 'auto' }),
    meters: z.array(MeterSchema).min(1, 'At least one meter is required'),
    scan: ScanSchema.default({}),
    exporters: z.array(ExporterEntrySchema).default([]),
    runtime: RuntimeSchema.default({}),
  })
  .superRefine((cfg, ctx) => {
    const seen = new Set<string>();
    cfg.meters.forEach((meter, i) => {
      if (seen.has(meter.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['meters', i, 'id'],
          message: `Duplicate meter id ${meter.id}`,
        });
      }
      seen.add(meter.id);
    });
  });

// --- Inferred types ---

export type MqttExporterEntry = z.infer<typeof MqttExporterSchema>;
export type WebhookExporterEntry = z.infer<typeof WebhookExporterSchema>;
export type ExporterEntry = z.infer<typeof ExporterEntrySchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;

// --- Error formatting ---

export function formatConfigError(error: z.ZodError, file = 'config.yaml'): string {
  const lines = [`Configuration error in ${file}:`, ''];

  for (const issue of error.issues) {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    lines.push(`  ${path}`);
    lines.push(`    ${issue.message}`);
    lines.push('');
  }

  lines.push("Run 'npm run scan' to find your meters' serial numbers.");

  return lines.join('\n');
}
