import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

export const DEFAULT_CONFIG_FILE = 'health-monitor.config.json';

export const HealthMonitorConfigSchema = z.object({
  outputDir: z.string().min(1).default('.'),
  format: z.enum(['json', 'text']).default('json'),
  topProcesses: z.number().int().min(0).default(20),
  includeAllConnections: z.boolean().default(false),
  cpuSampleIntervalMs: z.number().int().min(100).max(60000).default(1000),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  logDir: z.string().min(1).optional(),
}).strict();

export type HealthMonitorConfig = z.infer<typeof HealthMonitorConfigSchema>;
export type HealthMonitorConfigInput = z.input<typeof HealthMonitorConfigSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

export const defaultConfig: HealthMonitorConfig = HealthMonitorConfigSchema.parse({});

export function validateConfig(data: unknown): HealthMonitorConfig {
  const result = HealthMonitorConfigSchema.safeParse(data);
  if (!result.success) {
    throw new Error(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Read the JSON config file. An explicit path must exist; without one the
 * default file in the working directory is used when present.
 */
export function readConfigFile(configPath?: string, cwd: string = process.cwd()): HealthMonitorConfigInput {
  const p = configPath ? path.resolve(cwd, configPath) : path.join(cwd, DEFAULT_CONFIG_FILE);

  if (!fs.existsSync(p)) {
    if (configPath) {
      throw new Error(`Config file not found: ${p}`);
    }
    return {};
  }

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(p, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Config file ${p} is not valid JSON: ${reason}`);
  }

  const result = HealthMonitorConfigSchema.partial().safeParse(data);
  if (!result.success) {
    throw new Error(`Invalid configuration in ${p}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function loadConfig(
  overrides: HealthMonitorConfigInput = {},
  configPath?: string,
  cwd?: string
): HealthMonitorConfig {
  const merged: Record<string, unknown> = { ...readConfigFile(configPath, cwd) };
  // Flags the user did not pass arrive as undefined and must not mask the file
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return validateConfig(merged);
}
