import fs from 'node:fs';
import type { Server } from 'node:http';
import express, { type Response } from 'express';
import cors from 'cors';

import {
  countMatchups,
  fileLineSource,
  isBattleLogError,
  errorMessage,
  prepareReplay,
  renderReplayHtml,
  resolveOverrides,
  topMatchups,
  type BattleSelection,
  type BuildRecordOptions,
  type StepLogger,
} from '../../core/src/index.ts';
import { battleIndexSchema, listQuerySchema, matchupQuerySchema, overrideQuerySchema } from './schemas.ts';

export type ViewerAppOptions = {
  inputPath: string;
  embedBase: string;
  log: StepLogger;
  now?: BuildRecordOptions['now'];
};

type OverrideQuery = {
  p1_name?: string;
  p2_name?: string;
  p1_avatar?: string;
  p2_avatar?: string;
  both_name?: string;
  both_avatar?: string;
};

function toOverrides(q: OverrideQuery) {
  return resolveOverrides({
    p1Name: q.p1_name,
    p2Name: q.p2_name,
    p1Avatar: q.p1_avatar,
    p2Avatar: q.p2_avatar,
    bothName: q.both_name,
    bothAvatar: q.both_avatar,
  });
}

export function createViewerApp(opts: ViewerAppOptions) {
  const app = express();
  app.use(cors());

  // Re-read per request: the simulator may still be appending to the file.
  const source = () => fileLineSource(opts.inputPath);

  const inputMissing = (res: Response) => {
    if (fs.existsSync(opts.inputPath)) return false;
    res.status(404).json({ error: 'input_missing', message: `Input not found: ${opts.inputPath}` });
    return true;
  };

  const sendSelectionError = (res: Response, e: unknown) => {
    if (isBattleLogError(e)) {
      res.status(404).json({ error: 'not_found', code: e.code, message: e.message });
      return;
    }
    opts.log.error(errorMessage(e));
    res.status(500).json({ error: errorMessage(e) });
  };

  const sendReplay = (res: Response, selection: BattleSelection, q: OverrideQuery) => {
    try {
      const { block, record } = prepareReplay(source(), selection, toOverrides(q), { now: opts.now, log: opts.log });
      opts.log.debug(`viewer: ${block.header} -> ${record.roomId}`);
      res.type('text/html').send(renderReplayHtml(record, { embedBase: opts.embedBase }));
    } catch (e) {
      sendSelectionError(res, e);
    }
  };

  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.get('/api/battles', (req, res) => {
    if (inputMissing(res)) return;
    const q = listQuerySchema.safeParse(req.query);
    if (!q.success) return res.status(400).json({ error: 'invalid_query', issues: q.error.issues });
    const summary = countMatchups(source());
    res.json({ total: summary.total, unique: summary.counts.size, matchups: topMatchups(summary, q.data.top) });
  });

  app.get('/api/battles/:index', (req, res) => {
    if (inputMissing(res)) return;
    const index = battleIndexSchema.safeParse(req.params.index);
    if (!index.success) return res.status(400).json({ error: 'invalid_index' });
    try {
      const { block, record } = prepareReplay(source(), { kind: 'index', index: index.data }, {}, { now: opts.now });
      res.json({ header: block.header, record });
    } catch (e) {
      sendSelectionError(res, e);
    }
  });

  app.get('/viewer', (req, res) => {
    if (inputMissing(res)) return;
    const q = matchupQuerySchema.safeParse(req.query);
    if (!q.success) return res.status(400).json({ error: 'invalid_query', issues: q.error.issues });
    sendReplay(res, { kind: 'matchup', matchup: q.data.matchup, occurrence: q.data.occurrence }, q.data);
  });

  app.get('/viewer/:index', (req, res) => {
    if (inputMissing(res)) return;
    const index = battleIndexSchema.safeParse(req.params.index);
    const q = overrideQuerySchema.safeParse(req.query);
    if (!index.success) return res.status(400).json({ error: 'invalid_index' });
    if (!q.success) return res.status(400).json({ error: 'invalid_query', issues: q.error.issues });
    sendReplay(res, { kind: 'index', index: index.data }, q.data);
  });

  return app;
}

export function startViewerServer(opts: ViewerAppOptions & { port: number; host?: string }) {
  const app = createViewerApp(opts);
  const host = opts.host ?? '127.0.0.1';
  return new Promise<Server>((resolve, reject) => {
    const server = app.listen(opts.port, host);
    server.once('listening', () => {
      opts.log.info(`viewer listening on http://${host}:${opts.port}/viewer/0 (input: ${opts.inputPath})`);
      resolve(server);
    });
    server.once('error', reject);
  });
}
