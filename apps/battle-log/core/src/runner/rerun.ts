import { spawn } from 'node:child_process';
import fs from 'node:fs';
import path from 'node:path';
import type { RerunConfig } from '../config.ts';
import type { StepLogger } from '../utils/logger.ts';

const COMPLETED_BATTLE = ']]]]]\n';

export type RerunDeps = {
  runCommand: (bin: string, args: string[], log: StepLogger) => Promise<number | null>;
  sleep: (ms: number) => Promise<void>;
};

type LoopState = {
  iteration: number;
  attempts: number;
  totalRuns: number;
};

export type RerunResult = {
  completed: number;
  totalRuns: number;
  outputs: string[];
};

export function countCompletedBattles(text: string) {
  let n = 0;
  let pos = text.indexOf(COMPLETED_BATTLE);
  while (pos !== -1) {
    n++;
    pos = text.indexOf(COMPLETED_BATTLE, pos + COMPLETED_BATTLE.length);
  }
  return n;
}

export function isOutputComplete(filePath: string, minBattles: number) {
  if (!fs.existsSync(filePath)) return false;
  return countCompletedBattles(fs.readFileSync(filePath, 'utf8')) >= minBattles;
}

export function outputPathFor(cfg: RerunConfig, iteration: number) {
  return path.join(cfg.output_dir, `${cfg.base_name}${iteration + 1}${cfg.extension}`);
}

// Inherits stdio so the simulator's progress stays visible.
export function runCommand(bin: string, args: string[], log: StepLogger) {
  return new Promise<number | null>((resolve, reject) => {
    log.info(`cmd: ${bin} ${args.join(' ')}`);
    const proc = spawn(bin, args, { stdio: 'inherit' });
    proc.on('error', (err) => reject(err));
    proc.on('close', (code) => resolve(code));
  });
}

export function sleep(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

export const defaultRerunDeps: RerunDeps = { runCommand, sleep };

/**
 * Re-run the simulator until each of `count` output files holds at least
 * `expected_battles` finished battles. Files already complete are skipped.
 */
export async function runRerunLoop(cfg: RerunConfig, log: StepLogger, deps: RerunDeps = defaultRerunDeps): Promise<RerunResult> {
  fs.mkdirSync(cfg.output_dir, { recursive: true });
  const state: LoopState = { iteration: 0, attempts: 0, totalRuns: 0 };
  const outputs: string[] = [];

  while (state.iteration < cfg.count) {
    const outputPath = outputPathFor(cfg, state.iteration);

    if (isOutputComplete(outputPath, cfg.expected_battles)) {
      log.info(`${outputPath} complete. Proceeding to next iteration.`);
      outputs.push(outputPath);
      state.iteration++;
      state.attempts = 0;
      continue;
    }

    if (cfg.max_attempts_per_iteration !== null && state.attempts >= cfg.max_attempts_per_iteration) {
      throw new Error(`${outputPath} still incomplete after ${state.attempts} attempt(s)`);
    }

    log.warn(`${outputPath} missing or incomplete (< ${cfg.expected_battles} battles). Retrying simulation...`);
    state.attempts++;
    state.totalRuns++;
    const code = await deps.runCommand(cfg.command, [...cfg.args, outputPath], log);
    if (code !== 0) log.warn(`simulation exited with code ${code}`);
    await deps.sleep(cfg.retry_delay_ms);
  }

  log.info(`All ${cfg.count} iterations complete.`);
  return { completed: state.iteration, totalRuns: state.totalRuns, outputs };
}
