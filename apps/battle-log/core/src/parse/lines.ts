import fs from 'node:fs';
import type { LineSource } from '../types.ts';

export const START_MARKER = '[[[[[';
export const END_MARKER = ']]]]]';

export function isStartMarker(line: string) {
  return line.trim() === START_MARKER;
}

export function isEndMarker(line: string) {
  return line.trim() === END_MARKER;
}

// No trim here: a line with leading whitespace is not protocol.
export function isProtocolLine(line: string) {
  return line.startsWith('|');
}

// \n, \r\n and a lone \r all end a line.
function* splitLines(text: string): Generator<string> {
  const lineBreak = /\r\n|\r|\n/g;
  let pos = 0;
  while (pos < text.length) {
    const m = lineBreak.exec(text);
    if (!m) {
      yield text.slice(pos);
      return;
    }
    yield text.slice(pos, m.index);
    pos = m.index + m[0].length;
  }
}

export function textLineSource(text: string): LineSource {
  return () => splitLines(text);
}

// Invalid UTF-8 sequences decode to U+FFFD instead of throwing.
export function fileLineSource(filePath: string): LineSource {
  return () => splitLines(fs.readFileSync(filePath).toString('utf8'));
}

// Substring check: a marker anywhere in the text selects marked mode, even when it
// is not on a line of its own. Markers never span a line break.
export function hasMarkers(source: LineSource) {
  let sawStart = false;
  let sawEnd = false;
  for (const line of source()) {
    if (!sawStart && line.includes(START_MARKER)) sawStart = true;
    if (!sawEnd && line.includes(END_MARKER)) sawEnd = true;
    if (sawStart && sawEnd) return true;
  }
  return false;
}
