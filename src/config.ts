import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { homedir } from 'os';
import { fileURLToPath } from 'url';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { DEFAULT_STORE_PATH } from './stores/index.js';

export const DEFAULT_POLICY_DIR = fileURLToPath(new URL('../policies', import.meta.url));

const BackendSchema = z.object({
  name: z.string(),
  type: z.enum(['anthropic', 'ollama']),
  model: z.string(),
  baseUrl: z.string().url().optional()
});

const ConfigSchema = z.object({
  server: z.object({
    port: z.number().int().positive().default(8088),
    host: z.string().default('127.0.0.1')
  }).default({}),
  auth: z.object({
    api_keys: z.array(z.string().min(1)).default([]),
    allowed_origins: z.array(z.string()).default(['http://localhost:3000'])
  }).default({}),
  rate_limits: z.object({
    requests_per_minute: z.number().int().positive().default(60),
    max_input_chars: z.number().int().positive().default(2000)
  }).default({}),
  inference: z.object({
    backends: z.array(BackendSchema).min(1).default([
      { name: 'claude', type: 'anthropic', model: 'claude-3-5-haiku-latest' },
      { name: 'local', type: 'ollama', model: 'llama3.1' }
    ]),
    default: z.string().default('claude'),
    timeout_ms: z.number().int().positive().optional()
  }).default({}),
  pipeline: z.object({
    max_retries: z.number().int().min(0).default(3),
    history_turns: z.number().int().min(0).default(3),
    simple_threshold: z.number().int().min(0).default(800),
    fail_open: z.boolean().default(true)
  }).default({}),
  sessions: z.object({
    max_sessions: z.number().int().positive().default(1000)
  }).default({}),
  audit: z.object({
    enabled: z.boolean().default(true),
    log_path: z.string().default(resolve(homedir(), '.replyguard', 'logs', 'audit.jsonl'))
  }).default({}),
  policies: z.object({
    directory: z.string().default(DEFAULT_POLICY_DIR),
    default: z.string().default('default')
  }).default({}),
  store: z.object({
    path: z.string().default(DEFAULT_STORE_PATH)
  }).default({}),
  search: z.object({
    semantic: z.boolean().default(true),
    web: z.boolean().default(true),
    tavily_api_key: z.string().optional()
  }).default({})
});

export type ReplyGuardConfig = z.infer<typeof ConfigSchema>;
export type BackendConfig = z.infer<typeof BackendSchema>;

export const CONFIG_PATHS = [
  resolve(process.cwd(), 'replyguard.yaml'),
  resolve(homedir(), '.replyguard', 'config.yaml')
];

/**
 * Validate a config document and fill the environment-provided secrets.
 * Environment values win over file values.
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): ReplyGuardConfig {
  const config = ConfigSchema.parse(raw ?? {});

  const envKey = env.REPLYGUARD_API_KEY;
  if (envKey && !config.auth.api_keys.includes(envKey)) {
    config.auth.api_keys.push(envKey);
  }

  if (env.TAVILY_API_KEY) {
    config.search.tavily_api_key = env.TAVILY_API_KEY;
  }

  return config;
}

export function loadConfig(paths: string[] = CONFIG_PATHS, env: NodeJS.ProcessEnv = process.env): ReplyGuardConfig {
  for (const path of paths) {
    if (existsSync(path)) {
      return parseConfig(parseYaml(readFileSync(path, 'utf-8')), env);
    }
  }

  return parseConfig({}, env);
}
