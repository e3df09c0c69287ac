import { describe, it, expect, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { JsonlLogger } from './jsonlLogger';
import type { GenerationFailed, StageStarted } from '../types/events';

describe('JsonlLogger', () => {
  let tmpDir: string;

  const event1: StageStarted = {
    schemaVersion: 1,
    timestamp: '2023-01-01T00:00:00Z',
    runId: 'run-1',
    type: 'StageStarted',
    payload: { stage: 'judge', plannedItems: 4 },
  };

  afterEach(async () => {
    vi.restoreAllMocks();
    if (tmpDir) {
      await fs.rm(tmpDir, { recursive: true, force: true });
    }
  });

  it('logs events to file in JSONL format, creating the directory', async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'bench-logger-test-'));
    const logPath = path.join(tmpDir, 'nested', 'events.jsonl');
    const logger = new JsonlLogger(logPath);

    await logger.log(event1);

    const content = await fs.readFile(logPath, 'utf8');
    expect(content.trim()).toBe(JSON.stringify(event1));
  });

  it('appends multiple events', async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'bench-logger-test-'));
    const logPath = path.join(tmpDir, 'events.jsonl');
    const logger = new JsonlLogger(logPath);
    const event2 = { ...event1, timestamp: '2023-01-01T00:00:01Z' };

    await logger.log(event1);
    await logger.log(event2);

    const lines = (await fs.readFile(logPath, 'utf8')).trim().split('\n');
    expect(lines.length).toBe(2);
    expect(JSON.parse(lines[0])).toEqual(event1);
    expect(JSON.parse(lines[1])).toEqual(event2);
  });

  it('redacts secrets in event payloads', async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'bench-logger-test-'));
    const logPath = path.join(tmpDir, 'events.jsonl');
    const failed: GenerationFailed = {
      schemaVersion: 1,
      timestamp: '2023-01-01T00:00:00Z',
      runId: 'run-1',
      type: 'GenerationFailed',
      payload: { model: 'm1', promptId: 'P1', error: 'Incorrect key sk-testtesttesttesttesttesttest' },
    };

    await new JsonlLogger(logPath).log(failed);

    const written = JSON.parse(await fs.readFile(logPath, 'utf8'));
    expect(written.payload.error).toBe('Incorrect key [REDACTED]');
  });

  it('implements trace via log plus an info line', async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'bench-logger-test-'));
    const logPath = path.join(tmpDir, 'events.jsonl');
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const logger = new JsonlLogger(logPath, { stage: 'judge' });

    await logger.trace(event1, 'started');

    const content = await fs.readFile(logPath, 'utf8');
    expect(content.trim()).toBe(JSON.stringify(event1));
    expect(infoSpy).toHaveBeenCalledWith('[stage=judge] started');
  });

  it('prefixes messages for child loggers', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = new JsonlLogger('/dev/null', {}, true);
    logger.child({ a: 1 }).debug('d');
    logger.child({ a: 1 }).child({ b: 'x' }).info('i');
    logger.child({}).warn('w');

    expect(debugSpy).toHaveBeenCalledWith('[a=1] d');
    expect(infoSpy).toHaveBeenCalledWith('[a=1 b=x] i');
    expect(warnSpy).toHaveBeenCalledWith('w');
  });

  it('keeps stdout silent when quiet, including in children', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = new JsonlLogger('/dev/null', {}, true, true).child({ model: 'm' });
    logger.debug('d');
    logger.info('i');
    logger.warn('w');

    expect(debugSpy).not.toHaveBeenCalled();
    expect(infoSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith('[model=m] w');
  });

  it('logs errors with and without messages', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = new JsonlLogger('/dev/null', { scope: 't' });
    logger.error(new Error('boom'));
    logger.error(new Error('boom'), 'msg');

    expect(errorSpy).toHaveBeenCalledWith(expect.any(Error));
    expect(errorSpy).toHaveBeenCalledWith('[scope=t] msg', expect.any(Error));
  });

  it('does not throw if appending to the file fails', async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'bench-logger-test-'));
    // A directory path makes appendFile fail with EISDIR.
    const logPath = tmpDir;
    const logger = new JsonlLogger(logPath);

    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    await expect(logger.log(event1)).resolves.toBeUndefined();

    expect(errorSpy).toHaveBeenCalledWith(
      `Failed to write to log file at ${logPath}`,
      expect.any(Error),
    );
  });
});
