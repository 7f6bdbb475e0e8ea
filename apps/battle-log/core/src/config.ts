import { z } from 'zod';
import { DEFAULT_EMBED_BASE } from './replay/html.ts';

export const viewerConfigSchema = z.object({
  folder: z.string().min(1),
  input: z.string().min(1),
  output: z.string().min(1),
  embed_base: z.string().url(),
  port: z.number().int().min(1).max(65535),
  debug: z.boolean(),
  log_file: z.string().min(1).nullable(),
});

export const rerunConfigSchema = z.object({
  output_dir: z.string().min(1),
  base_name: z.string().min(1),
  extension: z.string(),
  count: z.number().int().min(1),
  expected_battles: z.number().int().min(1),
  command: z.string().min(1),
  args: z.array(z.string()),
  retry_delay_ms: z.number().int().min(0),
  max_attempts_per_iteration: z.number().int().min(1).nullable(),
});

export type ViewerConfig = z.infer<typeof viewerConfigSchema>;
export type RerunConfig = z.infer<typeof rerunConfigSchema>;

type Env = Record<string, string | undefined>;

export function boolEnv(env: Env, name: string, def = false): boolean {
  const v = String(env[name] ?? '').trim().toLowerCase();
  if (!v) return def;
  return v === '1' || v === 'true' || v === 'yes' || v === 'on';
}

export function numEnv(env: Env, name: string, def: number): number {
  const raw = String(env[name] ?? '').trim();
  if (!raw) return def;
  const n = Number(raw);
  return Number.isFinite(n) ? n : def;
}

function strEnv(env: Env, name: string, def: string): string {
  return String(env[name] ?? '').trim() || def;
}

export function defaultViewerConfig(env: Env = process.env): ViewerConfig {
  return {
    folder: strEnv(env, 'BATTLE_LOG_FOLDER', 'TestOutput'),
    input: strEnv(env, 'BATTLE_LOG_INPUT', 'output1.txt'),
    output: 'replay.html',
    embed_base: strEnv(env, 'BATTLE_LOG_EMBED_BASE', DEFAULT_EMBED_BASE),
    port: numEnv(env, 'BATTLE_LOG_PORT', 8001),
    debug: boolEnv(env, 'BATTLE_LOG_DEBUG', false),
    log_file: String(env.BATTLE_LOG_LOG_FILE ?? '').trim() || null,
  };
}

export function mergeViewerConfig(partial: Partial<ViewerConfig> = {}, env: Env = process.env): ViewerConfig {
  const defaults = defaultViewerConfig(env);
  const defined = Object.fromEntries(Object.entries(partial).filter(([, v]) => v !== undefined));
  return viewerConfigSchema.parse({ ...defaults, ...defined });
}

export function defaultRerunConfig(): Omit<RerunConfig, 'command' | 'output_dir'> {
  return {
    base_name: 'output',
    extension: '.txt',
    count: 100,
    expected_battles: 1,
    args: [],
    retry_delay_ms: 2000,
    max_attempts_per_iteration: null,
  };
}

export function mergeRerunConfig(partial: Partial<RerunConfig> & Pick<RerunConfig, 'command' | 'output_dir'>): RerunConfig {
  const defined = Object.fromEntries(Object.entries(partial).filter(([, v]) => v !== undefined));
  return rerunConfigSchema.parse({ ...defaultRerunConfig(), ...defined });
}
