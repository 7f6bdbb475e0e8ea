import { BattleIndexOutOfRangeError, MatchupNotFoundError } from '../errors.ts';
import { iterBattles } from '../parse/segmenter.ts';
import type { BattleBlock, BattleSelection, LineSource, MatchupCount, MatchupSummary } from '../types.ts';

export const DEFAULT_TOP_N = 80;

function normalizeMatchup(s: string) {
  return s.trim().toLowerCase();
}

export function getBattleByIndex(source: LineSource, index: number): BattleBlock {
  let seen = 0;
  const valid = Number.isInteger(index) && index >= 0;
  for (const block of iterBattles(source)) {
    if (valid && seen === index) return block;
    seen++;
  }
  throw new BattleIndexOutOfRangeError(index, seen);
}

export function getBattleByMatchup(source: LineSource, matchup: string, occurrence = 0): BattleBlock {
  const target = normalizeMatchup(matchup);
  let hits = 0;
  for (const block of iterBattles(source)) {
    if (normalizeMatchup(block.header) !== target) continue;
    if (hits === occurrence) return block;
    hits++;
  }
  throw new MatchupNotFoundError(matchup, occurrence, hits);
}

export function selectBattle(source: LineSource, selection: BattleSelection): BattleBlock {
  if (selection.kind === 'index') return getBattleByIndex(source, selection.index);
  return getBattleByMatchup(source, selection.matchup, selection.occurrence);
}

export function countMatchups(source: LineSource): MatchupSummary {
  const counts = new Map<string, number>();
  let total = 0;
  for (const block of iterBattles(source)) {
    counts.set(block.header, (counts.get(block.header) ?? 0) + 1);
    total++;
  }
  return { total, counts };
}

// Array.prototype.sort is stable, so equal counts keep first-seen order.
export function topMatchups(summary: MatchupSummary, topN = DEFAULT_TOP_N): MatchupCount[] {
  return Array.from(summary.counts, ([header, count]) => ({ header, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, Math.max(0, topN));
}

export function listMatchups(source: LineSource, topN = DEFAULT_TOP_N): MatchupCount[] {
  return topMatchups(countMatchups(source), topN);
}

export function formatMatchupListing(summary: MatchupSummary, topN = DEFAULT_TOP_N): string[] {
  if (summary.total === 0) return ['No battles found.'];
  const lines = [`Found ${summary.total} battle(s) across ${summary.counts.size} unique matchup header(s):`];
  for (const { header, count } of topMatchups(summary, topN)) {
    lines.push(`${String(count).padStart(5)}  ${header}`);
  }
  return lines;
}
