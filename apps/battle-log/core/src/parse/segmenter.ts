import { UNKNOWN_MATCHUP, type BattleBlock, type LineSource } from '../types.ts';
import { hasMarkers, isEndMarker, isProtocolLine, isStartMarker } from './lines.ts';

function freezeBlock(header: string | null, protocolLines: string[]): BattleBlock {
  return Object.freeze({
    header: header ?? UNKNOWN_MATCHUP,
    protocolLines: Object.freeze(protocolLines),
  });
}

/**
 * Battles wrapped in `[[[[[` ... `]]]]]` regions. The first non-blank line inside a
 * region is the matchup header; only protocol lines are kept after it.
 * A region still open at end of input is dropped.
 */
export function* iterBattlesMarked(source: LineSource): Generator<BattleBlock> {
  let inBlock = false;
  let awaitingHeader = false;
  let header: string | null = null;
  let protocolLines: string[] = [];

  for (const line of source()) {
    if (!inBlock) {
      if (isStartMarker(line)) {
        inBlock = true;
        awaitingHeader = true;
        header = null;
        protocolLines = [];
      }
      continue;
    }

    if (isEndMarker(line)) {
      yield freezeBlock(header, protocolLines);
      inBlock = false;
      awaitingHeader = false;
      header = null;
      protocolLines = [];
      continue;
    }

    if (awaitingHeader) {
      const trimmed = line.trim();
      if (trimmed) {
        header = trimmed;
        awaitingHeader = false;
      }
      continue;
    }

    if (isProtocolLine(line)) protocolLines.push(line);
  }
}

/** Whole input as one battle, for logs written without markers. */
export function parseSingleBattleFallback(source: LineSource): BattleBlock {
  let header: string | null = null;
  const protocolLines: string[] = [];

  for (const line of source()) {
    if (!line.trim()) continue;
    if (isProtocolLine(line)) {
      protocolLines.push(line);
    } else if (header === null) {
      header = line.trim();
    }
  }
  return freezeBlock(header, protocolLines);
}

// Two passes over the source: one to pick the mode, one to emit. Logs are small
// enough that reading twice is fine.
export function* iterBattles(source: LineSource): Generator<BattleBlock> {
  if (hasMarkers(source)) {
    yield* iterBattlesMarked(source);
  } else {
    yield parseSingleBattleFallback(source);
  }
}
