import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { MemoryLogger, ProjectLogger, formatData, isLogLevel, type LogEntry } from './projectLogger.js';

let tmpDir: string;

function logDir(): string {
  return path.join(tmpDir, '.pipeflow', 'logs');
}

function readJsonl(): unknown[] {
  return fs
    .readFileSync(path.join(logDir(), 'project.jsonl'), 'utf-8')
    .trim()
    .split('\n')
    .map((line): unknown => JSON.parse(line));
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pipeflow-logger-test-'));
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('ProjectLogger', () => {
  it('should create the log directory under the project', () => {
    ProjectLogger.forProject(tmpDir);
    expect(fs.existsSync(logDir())).toBe(true);
  });

  it('should write JSONL entries with data', () => {
    const logger = ProjectLogger.forProject(tmpDir, { console: false });
    logger.info('Item finished', { item: 'A', finishState: 0 });
    logger.warn('Edge already exists');

    const entries = readJsonl();
    expect(entries).toHaveLength(2);
    expect(entries[0]).toMatchObject({ level: 'info', event: 'Item finished', data: { item: 'A', finishState: 0 } });
    expect(entries[1]).toMatchObject({ level: 'warn', event: 'Edge already exists' });
    expect(entries[1]).not.toHaveProperty('data');
  });

  it('should write human-readable lines', () => {
    const logger = ProjectLogger.forProject(tmpDir, { console: false });
    logger.error('Tool failed', { item: 'T', exitCode: 2 });

    const text = fs.readFileSync(path.join(logDir(), 'project.log'), 'utf-8');
    expect(text).toMatch(/^\[[^\]]+\] \[ERROR\] Tool failed item=T, exitCode=2\n$/);
  });

  it('should drop entries below the configured level', () => {
    const entries: LogEntry[] = [];
    const logger = new ProjectLogger({ level: 'warn', console: false, sink: (e) => entries.push(e) });
    logger.debug('a');
    logger.info('b');
    logger.warn('c');
    logger.error('d');
    expect(entries.map((e) => e.event)).toEqual(['c', 'd']);
  });

  it('should echo to the console by level', () => {
    const logger = new ProjectLogger();
    logger.info('Project loaded', { name: 'demo' });
    logger.warn('careful');
    logger.error('broken');

    expect(console.log).toHaveBeenCalledWith('[pipeflow] Project loaded name=demo');
    expect(console.warn).toHaveBeenCalledWith('[pipeflow] careful');
    expect(console.error).toHaveBeenCalledWith('[pipeflow] broken');
  });

  it('should stay quiet on the console when asked', () => {
    const logger = new ProjectLogger({ console: false });
    logger.error('broken');
    expect(console.error).not.toHaveBeenCalled();
  });

  it('should keep logging to the sink after a file write fails', () => {
    const entries: LogEntry[] = [];
    const logger = ProjectLogger.forProject(tmpDir, { console: false, sink: (e) => entries.push(e) });
    fs.rmSync(path.join(tmpDir, '.pipeflow'), { recursive: true, force: true });

    logger.info('first');
    logger.info('second');

    expect(entries.map((e) => e.event)).toEqual(['first', 'second']);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });
});

describe('formatData', () => {
  it('should format scalars, objects and long strings', () => {
    expect(formatData({ n: 1, ok: true, list: ['a'], long: 'x'.repeat(201) })).toBe(
      'n=1, ok=true, list=["a"], long=[201 chars]',
    );
  });
});

describe('isLogLevel', () => {
  it('should accept only known levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});

describe('MemoryLogger', () => {
  it('should record entries and filter events by level', () => {
    const logger = new MemoryLogger();
    logger.info('a', { x: 1 });
    logger.error('b');

    expect(logger.events()).toEqual(['a', 'b']);
    expect(logger.events('error')).toEqual(['b']);
    expect(logger.entries[0].data).toEqual({ x: 1 });
  });
});
