export type BattleLogErrorCode = 'OUT_OF_RANGE' | 'NOT_FOUND';

export class BattleLogError extends Error {
  readonly code: BattleLogErrorCode;

  constructor(code: BattleLogErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class BattleIndexOutOfRangeError extends BattleLogError {
  readonly index: number;
  readonly available: number;

  constructor(index: number, available: number) {
    super('OUT_OF_RANGE', `Battle index ${index} out of range (${available} battle(s) available).`);
    this.index = index;
    this.available = available;
  }
}

export class MatchupNotFoundError extends BattleLogError {
  readonly matchup: string;
  readonly occurrence: number;
  readonly found: number;

  constructor(matchup: string, occurrence: number, found: number) {
    super('NOT_FOUND', `No matchup "${matchup}" found at occurrence ${occurrence} (${found} match(es)).`);
    this.matchup = matchup;
    this.occurrence = occurrence;
    this.found = found;
  }
}

export function isBattleLogError(e: unknown): e is BattleLogError {
  return e instanceof BattleLogError;
}

export function errorMessage(e: unknown) {
  return e instanceof Error ? e.message : String(e);
}
