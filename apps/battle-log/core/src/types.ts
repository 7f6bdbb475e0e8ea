export const UNKNOWN_MATCHUP = 'UNKNOWN_MATCHUP';

export type BattleBlock = {
  readonly header: string;
  // Only lines starting with '|', in file order.
  readonly protocolLines: readonly string[];
};

export type LineSource = () => Iterable<string>;

export type PlayerSide = 'p1' | 'p2';

export type PlayerOverrides = {
  p1Name?: string;
  p1Avatar?: string;
  p2Name?: string;
  p2Avatar?: string;
};

export type MatchupCount = {
  header: string;
  count: number;
};

export type MatchupSummary = {
  total: number;
  counts: Map<string, number>;
};

export type BattleSelection =
  | { kind: 'index'; index: number }
  | { kind: 'matchup'; matchup: string; occurrence: number };

export type ReplayRecord = {
  player1: string;
  player2: string;
  format: string;
  timestamp: string;
  log: string[];
  roomId: string;
};

// JSON shape consumed by the replay renderer.
export type ReplayPayload = {
  p1: string;
  p2: string;
  log: string[];
  inputLog: string;
  roomid: string;
  format: string;
  timestamp: string;
};
