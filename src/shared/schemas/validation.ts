import { z } from 'zod';

/**
 * Base Zod Schemas for validation
 *
 * Configuration read from the environment and the options accepted by the
 * inspection CLI are validated here before anything else touches them.
 */

// =============================================================================
// Configuration Schemas
// =============================================================================

/**
 * Log levels understood by the logger helper
 */
export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Environment variables consulted by ConfigManager
 */
export const ConfigEnvSchema = z.object({
  NODE_ENV: z.string().optional(),
  MAILNORM_LOG_LEVEL: LogLevelSchema.optional(),
  MAILNORM_LOG_FILE: z.string().min(1).optional(),
  MAILNORM_LOG_MAX_SIZE: z.coerce.number().int().positive().optional(),
});

export type ConfigEnv = z.infer<typeof ConfigEnvSchema>;

/**
 * Resolved application configuration
 */
export const AppConfigSchema = z.object({
  logLevel: LogLevelSchema,
  /** File transport is disabled when no path is configured */
  logFile: z.string().min(1).optional(),
  logMaxSize: z.number().int().positive(),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

// =============================================================================
// CLI Schemas
// =============================================================================

export const InspectModeSchema = z.enum(['table', 'json', 'summary', 'diagnose']);

export type InspectMode = z.infer<typeof InspectModeSchema>;

/**
 * Options of the inspection CLI
 *
 * Attachment extraction works on exactly one file and needs an output path.
 */
export const InspectOptionsSchema = z
  .object({
    files: z.array(z.string().min(1)).min(1, 'At least one email file is required'),
    mode: InspectModeSchema.default('table'),
    attachment: z.string().min(1).optional(),
    out: z.string().min(1).optional(),
    help: z.boolean().default(false),
  })
  .superRefine((options, ctx) => {
    if (options.attachment === undefined) {
      return;
    }
    if (options.files.length !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['files'],
        message: '--attachment takes exactly one email file',
      });
    }
    if (options.out === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['out'],
        message: '--attachment requires --out <path>',
      });
    }
  });

export type InspectOptions = z.infer<typeof InspectOptionsSchema>;
