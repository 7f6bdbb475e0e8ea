#!/usr/bin/env -S npx tsx
import fs from 'node:fs';
import path from 'node:path';

import {
  countMatchups,
  createStepLogger,
  errorMessage,
  fileLineSource,
  formatMatchupListing,
  hasOverrides,
  isBattleLogError,
  mergeRerunConfig,
  mergeViewerConfig,
  prepareReplay,
  renderReplayHtml,
  resolveOverrides,
  runRerunLoop,
  type BattleSelection,
} from '../../core/src/index.ts';
import { startViewerServer } from '../../server/src/app.ts';

function readArg(name: string) {
  const idx = process.argv.indexOf(name);
  if (idx === -1) return undefined;
  return process.argv[idx + 1] ?? undefined;
}

function readArgs(name: string) {
  const out: string[] = [];
  process.argv.forEach((a, i) => {
    const next = process.argv[i + 1];
    if (a === name && next !== undefined) out.push(next);
  });
  return out;
}

function readInt(name: string) {
  const raw = readArg(name);
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n)) throw new Error(`${name} must be an integer (got "${raw}")`);
  return n;
}

function help(): never {
  console.log('battle-log CLI');
  console.log('Commands:');
  console.log('  list [--top <n>]');
  console.log('  render [--battle-index <i> | --matchup "<A vs B>" [--occurrence <n>]]');
  console.log('         [--p1-name] [--p2-name] [--p1-avatar] [--p2-avatar] [--both-name] [--both-avatar]');
  console.log('         [--embed-base <url>] [--output <file>]');
  console.log('  serve [--port <n>]');
  console.log('  rerun --cmd <bin> [--arg <a>]... [--count <n>] [--expected <n>] [--delay <ms>] [--max-attempts <n>]');
  console.log('Common: --folder <dir> (default TestOutput) --input <file> (default output1.txt)');
  process.exit(1);
}

function loadConfig() {
  return mergeViewerConfig({
    folder: readArg('--folder'),
    input: readArg('--input'),
    output: readArg('--output'),
    embed_base: readArg('--embed-base'),
    port: readInt('--port'),
  });
}

function requireInput(inputPath: string) {
  if (!fs.existsSync(inputPath)) {
    console.error(`Input not found: ${inputPath}`);
    process.exit(2);
  }
}

function selectionFromArgs(): BattleSelection {
  const matchup = readArg('--matchup');
  if (matchup !== undefined) return { kind: 'matchup', matchup, occurrence: readInt('--occurrence') ?? 0 };
  return { kind: 'index', index: readInt('--battle-index') ?? 0 };
}

async function main() {
  const cmd = process.argv[2];
  if (!cmd || cmd.startsWith('--')) help();

  const cfg = loadConfig();
  const log = createStepLogger({ logPath: cfg.log_file, debug: cfg.debug });
  const inputPath = path.join(cfg.folder, cfg.input);

  if (cmd === 'list') {
    requireInput(inputPath);
    const summary = countMatchups(fileLineSource(inputPath));
    for (const line of formatMatchupListing(summary, readInt('--top'))) console.log(line);
    return;
  }

  if (cmd === 'render') {
    requireInput(inputPath);
    const overrides = resolveOverrides({
      p1Name: readArg('--p1-name'),
      p2Name: readArg('--p2-name'),
      p1Avatar: readArg('--p1-avatar'),
      p2Avatar: readArg('--p2-avatar'),
      bothName: readArg('--both-name'),
      bothAvatar: readArg('--both-avatar'),
    });
    const { block, record } = prepareReplay(fileLineSource(inputPath), selectionFromArgs(), overrides, { log });
    const outputPath = path.join(cfg.folder, cfg.output);
    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    fs.writeFileSync(outputPath, renderReplayHtml(record, { embedBase: cfg.embed_base }), 'utf8');

    console.log(`Wrote: ${outputPath}`);
    console.log(`Selected battle header: ${block.header}`);
    if (hasOverrides(overrides)) {
      console.log(
        `Overrides -> p1: name=${overrides.p1Name ?? '-'} avatar=${overrides.p1Avatar ?? '-'} | ` +
          `p2: name=${overrides.p2Name ?? '-'} avatar=${overrides.p2Avatar ?? '-'}`
      );
    }
    console.log(`To view it over HTTP: battle-log serve --folder ${cfg.folder} --input ${cfg.input}`);
    return;
  }

  if (cmd === 'serve') {
    requireInput(inputPath);
    await startViewerServer({ inputPath, embedBase: cfg.embed_base, port: cfg.port, log });
    return;
  }

  if (cmd === 'rerun') {
    const command = readArg('--cmd');
    if (!command) throw new Error('--cmd required');
    const rerunCfg = mergeRerunConfig({
      command,
      args: readArgs('--arg'),
      output_dir: cfg.folder,
      count: readInt('--count'),
      expected_battles: readInt('--expected'),
      retry_delay_ms: readInt('--delay'),
      max_attempts_per_iteration: readInt('--max-attempts'),
    });
    const res = await runRerunLoop(rerunCfg, log);
    console.log(`completed: ${res.completed} (simulator runs: ${res.totalRuns})`);
    return;
  }

  help();
}

main().catch((e) => {
  // Selection errors are user input problems; anything else gets the stack.
  console.error(isBattleLogError(e) ? errorMessage(e) : e);
  process.exit(1);
});
