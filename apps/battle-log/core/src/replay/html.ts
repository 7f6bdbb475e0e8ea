import type { ReplayRecord } from '../types.ts';

export const DEFAULT_EMBED_BASE = 'https://play.pokemonshowdown.com';

export type RenderOptions = {
  embedBase?: string;
};

export function escapeHtml(s: string) {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function embedScriptUrl(embedBase = DEFAULT_EMBED_BASE) {
  return `${embedBase.replace(/\/+$/, '')}/js/replay-embed.js`;
}

export function replayTitle(record: ReplayRecord) {
  return `${record.format}: ${record.player1} vs. ${record.player2}`;
}

/**
 * Standalone page for the official replay-embed.js. The script reads the protocol log
 * from `.battle-log-data` and mounts into the `.wrapper.replay-wrapper` skeleton.
 */
export function renderReplayHtml(record: ReplayRecord, opts: RenderOptions = {}) {
  const logText = record.log.join('\n').replace(/<\/script/gi, '<\\/script');
  const title = escapeHtml(replayTitle(record));

  return `<!doctype html>
<html>
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>${title}</title>
  <style>
    html, body { margin: 0; padding: 0; }
    .wrapper.replay-wrapper { max-width: 1180px; margin: 0 auto; }
  </style>
</head>
<body>
  <input type="hidden" name="replayid" value="${escapeHtml(record.roomId)}" />
  <input type="hidden" name="format" value="${escapeHtml(record.format)}" />
  <input type="hidden" name="uploaddate" value="${escapeHtml(record.timestamp)}" />
  <script type="text/plain" class="battle-log-data">${logText}</script>
  <div class="wrapper replay-wrapper">
    <div class="battle"></div>
    <div class="battle-log"></div>
    <div class="replay-controls"></div>
    <div class="replay-controls-2"></div>
    <h1 style="font-weight:normal;text-align:center"><strong>${escapeHtml(record.format)}</strong><br />${escapeHtml(record.player1)} vs. ${escapeHtml(record.player2)}</h1>
  </div>
  <script src="${escapeHtml(embedScriptUrl(opts.embedBase))}"></script>
</body>
</html>
`;
}
