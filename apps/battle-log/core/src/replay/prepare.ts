import { selectBattle } from '../select/matchups.ts';
import type { BattleBlock, BattleSelection, LineSource, PlayerOverrides, ReplayRecord } from '../types.ts';
import type { StepLogger } from '../utils/logger.ts';
import { overridePlayers } from './overrides.ts';
import { buildReplayRecord, roomIdForSelection, type BuildRecordOptions } from './record.ts';

export type PreparedReplay = {
  block: BattleBlock;
  record: ReplayRecord;
};

export type PrepareOptions = Pick<BuildRecordOptions, 'now'> & {
  log?: StepLogger;
};

// select -> rewrite players -> build record
export function prepareReplay(
  source: LineSource,
  selection: BattleSelection,
  overrides: PlayerOverrides = {},
  opts: PrepareOptions = {}
): PreparedReplay {
  const block = selectBattle(source, selection);
  const protocol = overridePlayers(block.protocolLines, overrides);
  const record = buildReplayRecord(protocol, roomIdForSelection(selection), {
    now: opts.now,
    onBadTimestamp: (raw) => opts.log?.debug(`unparseable |t:| value "${raw}", using current time`),
  });
  return { block, record };
}
