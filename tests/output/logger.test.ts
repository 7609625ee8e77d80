import { beforeEach, describe, expect, it, vi } from 'vitest';

const stream = vi.hoisted(() => ({
  write: vi.fn(),
  end: vi.fn(),
}));

vi.mock('fs', () => ({
  existsSync: vi.fn(),
  mkdirSync: vi.fn(),
  createWriteStream: vi.fn(() => stream),
}));

import * as fs from 'fs';

import { createLogger, createNullLogger } from '../../src/output/logger.js';

describe('createLogger', () => {
  const { write, end } = stream;

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('returns a no-op logger when disabled', () => {
    const logger = createLogger(false, 'logs', 'story.tale');

    logger.logEvent({ event: 'ignored' });

    expect(logger.filePath).toBeNull();
    expect(fs.createWriteStream).not.toHaveBeenCalled();
  });

  it('creates the log directory when missing', () => {
    vi.mocked(fs.existsSync).mockReturnValue(false);

    createLogger(true, 'out/logs', 'story.tale');

    expect(fs.mkdirSync).toHaveBeenCalledWith('out/logs', { recursive: true });
  });

  it('names the file after the script', () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);

    const logger = createLogger(true, 'logs', 'stories/cave.tale');

    expect(logger.filePath).toMatch(
      /^logs\/cave-\d{4}-\d{2}-\d{2}T\d{2}-\d{2}-\d{2}\.log$/
    );
  });

  it('writes events as JSON lines', () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    const logger = createLogger(true, 'logs', 'story.tale');

    logger.logEvent({ event: 'jump', line: 3 });

    const written = String(write.mock.calls[0]?.[0]);
    expect(written.endsWith('\n')).toBe(true);
    expect(JSON.parse(written)).toMatchObject({
      type: 'taleloom',
      event: 'jump',
      line: 3,
    });
  });

  it('ends the stream on close', () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    const logger = createLogger(true, 'logs', 'story.tale');

    logger.close();

    expect(end).toHaveBeenCalled();
  });
});

describe('createNullLogger', () => {
  it('has no file', () => {
    expect(createNullLogger().filePath).toBeNull();
  });
});
