import type { PlayerOverrides, PlayerSide } from '../types.ts';

const PLAYER_FIELDS = 6; // ['', 'player', side, name, avatar, '']
const DEFAULT_AVATAR = '1';

function playerPrefix(side: PlayerSide) {
  return `|player|${side}|`;
}

function isMatchStart(line: string) {
  return line === '|start' || line.startsWith('|start|');
}

function fixPlayerLine(line: string, name: string | undefined, avatar: string | undefined) {
  const parts = line.split('|');
  while (parts.length < PLAYER_FIELDS) parts.push('');
  if (name !== undefined) parts[3] = name;
  if (avatar !== undefined) parts[4] = avatar;
  return parts.join('|');
}

function sideOverrides(overrides: PlayerOverrides, side: PlayerSide) {
  return side === 'p1'
    ? { name: overrides.p1Name, avatar: overrides.p1Avatar }
    : { name: overrides.p2Name, avatar: overrides.p2Avatar };
}

/**
 * Replace or insert the `|player|p1|Name|Avatar|` records so the replay shows the chosen
 * names and avatars. Returns a new array; the input is left as is.
 */
export function overridePlayers(protocolLines: readonly string[], overrides: PlayerOverrides = {}): string[] {
  const out = protocolLines.slice();
  const found: Record<PlayerSide, boolean> = { p1: false, p2: false };
  const sides: PlayerSide[] = ['p1', 'p2'];

  for (let i = 0; i < out.length; i++) {
    const side = sides.find((s) => out[i].startsWith(playerPrefix(s)));
    if (!side) continue;
    const { name, avatar } = sideOverrides(overrides, side);
    out[i] = fixPlayerLine(out[i], name, avatar);
    found[side] = true;
  }

  const startAt = out.findIndex(isMatchStart);
  const insertAt = startAt === -1 ? 0 : startAt;
  // Each synthesised line goes in at the same index, so p2 ends up ahead of p1.
  for (const side of sides) {
    const { name, avatar } = sideOverrides(overrides, side);
    if (found[side] || (name === undefined && avatar === undefined)) continue;
    out.splice(insertAt, 0, `${playerPrefix(side)}${name || side}|${avatar || DEFAULT_AVATAR}|`);
  }
  return out;
}

/** Per-side values win over the shared `both` values. */
export function resolveOverrides(input: {
  p1Name?: string;
  p2Name?: string;
  p1Avatar?: string;
  p2Avatar?: string;
  bothName?: string;
  bothAvatar?: string;
}): PlayerOverrides {
  const out: PlayerOverrides = {};
  const p1Name = input.p1Name || input.bothName;
  const p2Name = input.p2Name || input.bothName;
  const p1Avatar = input.p1Avatar || input.bothAvatar;
  const p2Avatar = input.p2Avatar || input.bothAvatar;
  if (p1Name) out.p1Name = p1Name;
  if (p2Name) out.p2Name = p2Name;
  if (p1Avatar) out.p1Avatar = p1Avatar;
  if (p2Avatar) out.p2Avatar = p2Avatar;
  return out;
}

export function hasOverrides(overrides: PlayerOverrides) {
  return [overrides.p1Name, overrides.p1Avatar, overrides.p2Name, overrides.p2Avatar].some((v) => v !== undefined);
}
