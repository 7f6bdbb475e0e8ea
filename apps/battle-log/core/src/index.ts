export * from './types.ts';
export * from './errors.ts';
export * from './config.ts';
export * from './parse/lines.ts';
export * from './parse/segmenter.ts';
export * from './select/matchups.ts';
export * from './replay/overrides.ts';
export * from './replay/record.ts';
export * from './replay/html.ts';
export * from './replay/prepare.ts';
export * from './runner/rerun.ts';
export * from './utils/logger.ts';
