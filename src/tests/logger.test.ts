import { describe, it, expect, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { createLogger, createMemoryLogger, isLevel } from '../utils/logger';

describe('logger', () => {
  const dirs: string[] = [];

  afterEach(() => {
    dirs.splice(0).forEach(d => fs.rmSync(d, { recursive: true, force: true }));
  });

  it('drops entries below its level', () => {
    const logger = createMemoryLogger('warn');
    logger.debug('d');
    logger.info('i');
    logger.warn('w', { a: 1 });
    logger.error('e');
    expect(logger.entries.map(e => e.level)).toEqual(['warn', 'error']);
    expect(logger.entries[0]).toMatchObject({ level: 'warn', msg: 'w', meta: { a: 1 } });
    expect(new Date(logger.entries[0]?.t ?? '').toISOString()).toBe(logger.entries[0]?.t);
  });

  it('writes JSON lines to latest.log, starting empty', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'design-logs-'));
    dirs.push(dir);
    fs.writeFileSync(path.join(dir, 'latest.log'), 'old run\n');

    const logger = createLogger({ dir, level: 'info' });
    logger.debug('hidden');
    logger.info('started', { port: 5000 });

    expect(logger.file).toBe(path.join(dir, 'latest.log'));
    const lines = fs.readFileSync(path.join(dir, 'latest.log'), 'utf8').trim().split('\n');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({ level: 'info', msg: 'started', meta: { port: 5000 } });
  });

  it('recognises level names', () => {
    expect(isLevel('warn')).toBe(true);
    expect(isLevel('WARN')).toBe(false);
    expect(isLevel('trace')).toBe(false);
  });
});
