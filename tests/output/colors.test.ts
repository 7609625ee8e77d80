import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  formatDuration,
  printError,
  printInfo,
  printWarning,
  truncate,
} from '../../src/output/colors.js';

describe('truncate', () => {
  it('returns short strings unchanged', () => {
    expect(truncate('hello', 10)).toBe('hello');
  });

  it('truncates long strings with ellipsis', () => {
    expect(truncate('hello world', 8)).toBe('hello wo...');
  });

  it('handles exact length', () => {
    expect(truncate('hello', 5)).toBe('hello');
  });
});

describe('formatDuration', () => {
  it('formats milliseconds', () => {
    expect(formatDuration(500)).toBe('500ms');
  });

  it('formats seconds', () => {
    expect(formatDuration(2500)).toBe('2.5s');
  });

  it('formats minutes and seconds', () => {
    expect(formatDuration(125000)).toBe('2m5s');
  });

  it('formats hours', () => {
    expect(formatDuration(3723000)).toBe('1h2m3s');
  });
});

describe('diagnostic output', () => {
  let consoleSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    consoleSpy.mockRestore();
  });

  it('prints info with the [TALELOOM] prefix on stderr', () => {
    printInfo('Test message');

    expect(consoleSpy).toHaveBeenCalledTimes(1);
    expect(consoleSpy.mock.calls[0]?.[0]).toBe(
      '\x1b[35m[TALELOOM]\x1b[0m Test message'
    );
  });

  it('prints warnings in yellow', () => {
    printWarning('Careful');

    const output = String(consoleSpy.mock.calls[0]?.[0]);
    expect(output).toContain('\x1b[33mCareful\x1b[0m');
  });

  it('prints errors in red', () => {
    printError('Broken');

    const output = String(consoleSpy.mock.calls[0]?.[0]);
    expect(output).toContain('\x1b[31mBroken\x1b[0m');
  });
});
