import type { BattleSelection, ReplayPayload, ReplayRecord } from '../types.ts';

export const DEFAULT_FORMAT = 'Custom Game';
export const DEFAULT_ROOM_ID = 'sim';
const ROOM_ID_MAX = 64;

const DAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

function pad2(n: number) {
  return String(n).padStart(2, '0');
}

/** `Tue Nov 14 2023 22:13:20`, always UTC. */
export function formatReplayTimestamp(date: Date) {
  const day = DAYS[date.getUTCDay()];
  const month = MONTHS[date.getUTCMonth()];
  const time = `${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())}:${pad2(date.getUTCSeconds())}`;
  return `${day} ${month} ${pad2(date.getUTCDate())} ${date.getUTCFullYear()} ${time}`;
}

export function parseEpochSeconds(raw: string | undefined): Date | null {
  const s = String(raw ?? '').trim();
  if (!/^[+-]?\d+$/.test(s)) return null;
  const date = new Date(Number(s) * 1000);
  return Number.isNaN(date.getTime()) ? null : date;
}

export function sanitizeRoomId(s: string, fallback = DEFAULT_ROOM_ID) {
  const cleaned = s.trim().toLowerCase().replace(/[^a-z0-9]+/g, '');
  return (cleaned || fallback).slice(0, ROOM_ID_MAX);
}

export function roomIdForSelection(selection: BattleSelection, fallback = DEFAULT_ROOM_ID) {
  const key =
    selection.kind === 'index' ? `sim-battle-${selection.index}` : `${selection.matchup}-${selection.occurrence}`;
  return sanitizeRoomId(key, fallback);
}

export type BuildRecordOptions = {
  now?: () => Date;
  onBadTimestamp?: (raw: string) => void;
};

function field(line: string, index: number) {
  return line.split('|')[index] ?? '';
}

export function buildReplayRecord(
  protocolLines: readonly string[],
  roomId: string,
  opts: BuildRecordOptions = {}
): ReplayRecord {
  let player1: string | null = null;
  let player2: string | null = null;
  let format: string | null = null;
  let timestamp: Date | null = null;
  let sawTimestamp = false;

  for (const line of protocolLines) {
    if (line.startsWith('|player|p1|')) {
      if (player1 === null) player1 = field(line, 3) || null;
    } else if (line.startsWith('|player|p2|')) {
      if (player2 === null) player2 = field(line, 3) || null;
    } else if (line.startsWith('|tier|')) {
      if (format === null) format = field(line, 2) || null;
    } else if (!sawTimestamp && line.startsWith('|t:|')) {
      sawTimestamp = true;
      const raw = field(line, 2);
      timestamp = parseEpochSeconds(raw);
      if (!timestamp) opts.onBadTimestamp?.(raw);
    }
  }

  const now = opts.now ?? (() => new Date());
  return {
    player1: player1 ?? 'p1',
    player2: player2 ?? 'p2',
    format: format ?? DEFAULT_FORMAT,
    timestamp: formatReplayTimestamp(timestamp ?? now()),
    // The replay renderer expects the log to end with an empty line.
    log: [...protocolLines, ''],
    roomId,
  };
}

export function toReplayPayload(record: ReplayRecord): ReplayPayload {
  return {
    p1: record.player1,
    p2: record.player2,
    log: record.log,
    inputLog: '',
    roomid: record.roomId,
    format: record.format,
    timestamp: record.timestamp,
  };
}
