import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { DEFAULT_SCENARIOS, type Scenario } from './scenarios.js';
import { logger } from './log.js';
import { describeError, formatIssues } from './errors.js';

export interface TargetSpec {
  command: string;
  args: string[];
  cwd: string;
  env: Record<string, string>;
}

export interface ProbeConfig {
  target: TargetSpec;
  timeouts: {
    handshake_ms: number;
    call_ms: number;
    grace_ms: number;
  };
  tool: {
    name: string;
    timeout_seconds: number;
  };
  protocol_version: string;
  client: {
    name: string;
    version: string;
  };
  send_initialized_notification: boolean;
  discover_tools: boolean;
  strict_metadata: boolean;
  skip_non_json_lines: boolean;
  fail_on_error: boolean;
  stderr_tail_lines: number;
  scenarios: Scenario[];
}

export const CONFIG_ENV_VAR = 'FETCH_PROBE_CONFIG';
export const CONFIG_FILE_NAME = 'fetch-probe.json';

export const DEFAULT_CONFIG: ProbeConfig = {
  target: {
    command: 'cargo',
    args: ['run', '--', 'mcp'],
    cwd: '.',
    env: {},
  },
  timeouts: {
    // cargo may compile before the server answers
    handshake_ms: 60000,
    call_ms: 20000,
    grace_ms: 5000,
  },
  tool: {
    name: 'fetch_web_content',
    timeout_seconds: 10,
  },
  protocol_version: '2024-11-05',
  client: {
    name: 'fetch-probe',
    version: '0.1.0',
  },
  send_initialized_notification: false,
  discover_tools: true,
  strict_metadata: false,
  skip_non_json_lines: false,
  fail_on_error: true,
  stderr_tail_lines: 20,
  scenarios: DEFAULT_SCENARIOS.map((s) => ({ ...s })),
};

const positiveMs = z.number().int().positive();

const ScenarioSchema = z.object({
  name: z.string().min(1),
  target: z.string().url(),
  expected_behavior_note: z.string(),
  expected_fetch_method: z.enum(['static', 'browser']).optional(),
});

export const ProbeConfigSchema: z.ZodType<ProbeConfig> = z.object({
  target: z.object({
    command: z.string().min(1),
    args: z.array(z.string()),
    cwd: z.string().min(1),
    env: z.record(z.string()),
  }),
  timeouts: z.object({
    handshake_ms: positiveMs,
    call_ms: positiveMs,
    grace_ms: positiveMs,
  }),
  tool: z.object({
    name: z.string().min(1),
    timeout_seconds: z.number().int().min(1).max(300),
  }),
  protocol_version: z.string().min(1),
  client: z.object({
    name: z.string().min(1),
    version: z.string().min(1),
  }),
  send_initialized_notification: z.boolean(),
  discover_tools: z.boolean(),
  strict_metadata: z.boolean(),
  skip_non_json_lines: z.boolean(),
  fail_on_error: z.boolean(),
  stderr_tail_lines: z.number().int().min(0),
  scenarios: z.array(ScenarioSchema).min(1),
});

export function defaultConfig(): ProbeConfig {
  return structuredClone(DEFAULT_CONFIG);
}

export function resolveConfigPath(explicitPath?: string): string {
  const fromEnv = process.env[CONFIG_ENV_VAR];
  if (explicitPath) return path.resolve(explicitPath);
  if (fromEnv) return path.resolve(fromEnv);
  return path.resolve(process.cwd(), CONFIG_FILE_NAME);
}

/**
 * Defaults merged with the JSON file, if any. Never throws: an unreadable or
 * invalid file is reported once and the defaults are used.
 */
export function loadConfig(configPath?: string): ProbeConfig {
  const file = resolveConfigPath(configPath);
  try {
    if (fs.existsSync(file)) {
      const raw = fs.readFileSync(file, 'utf-8');
      const userConfig: unknown = JSON.parse(raw);
      if (!isPlainObject(userConfig)) {
        logger.warn(`Ignoring ${file}: expected a JSON object`);
        return defaultConfig();
      }
      const defaults: Record<string, unknown> = { ...defaultConfig() };
      const merged = deepMerge(defaults, userConfig);
      const parsed = ProbeConfigSchema.safeParse(merged);
      if (!parsed.success) {
        logger.warn(`Ignoring ${file}: ${formatIssues(parsed.error)}`);
        return defaultConfig();
      }
      const config = parsed.data;
      config.target.cwd = path.resolve(path.dirname(file), config.target.cwd);
      return config;
    }
  } catch (e) {
    logger.warn(`Ignoring ${file}: ${describeError(e)}`);
  }
  return defaultConfig();
}

const DANGEROUS_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };
  for (const key of Object.keys(source)) {
    if (DANGEROUS_KEYS.has(key)) continue;
    const incoming = source[key];
    const existing = target[key];
    if (isPlainObject(incoming) && isPlainObject(existing)) {
      result[key] = deepMerge(existing, incoming);
    } else {
      result[key] = incoming;
    }
  }
  return result;
}
