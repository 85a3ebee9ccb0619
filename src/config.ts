import { z } from 'zod';
import type { TrackerOptions } from './tracker/engine.js';

const flag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

export const LogLevelSchema = z.enum(['silent', 'error', 'warn', 'info', 'debug']);

export const EnvSchema = z.object({
  TASK_TRACKER_LOG_LEVEL: LogLevelSchema.optional(),
  TASK_TRACKER_STRICT_UPDATES: flag.optional(),
  TASK_TRACKER_DEDUPE_REASSIGN: flag.optional(),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

export function readEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  return EnvSchema.parse(env);
}

export function engineOptionsFromEnv(
  env: EnvConfig = readEnv(),
): Pick<TrackerOptions, 'strictUpdates' | 'dedupeReassign'> {
  return {
    strictUpdates: env.TASK_TRACKER_STRICT_UPDATES ?? false,
    dedupeReassign: env.TASK_TRACKER_DEDUPE_REASSIGN ?? false,
  };
}

export function configReport(env: EnvConfig = readEnv()) {
  const opts = engineOptionsFromEnv(env);
  const notes: string[] = [];

  if (!opts.strictUpdates) {
    notes.push('update-user / update-task apply values verbatim. Set TASK_TRACKER_STRICT_UPDATES=true to validate them.');
  }
  if (!opts.dedupeReassign) {
    notes.push('reassign-task keeps repeated ids. Set TASK_TRACKER_DEDUPE_REASSIGN=true to drop them.');
  }

  return {
    logLevel: env.TASK_TRACKER_LOG_LEVEL ?? 'warn',
    strictUpdates: opts.strictUpdates,
    dedupeReassign: opts.dedupeReassign,
    notes,
  };
}
