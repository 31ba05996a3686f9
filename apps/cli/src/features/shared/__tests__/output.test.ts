import * as p from '@clack/prompts';
import type { MockInstance } from 'vitest';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ExitCodes } from '../exit-codes.js';
import { OutputManager } from '../output.js';

vi.mock('@clack/prompts', () => ({
  intro: vi.fn(),
  outro: vi.fn(),
  note: vi.fn(),
  log: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

vi.mock('@burnish/logger', () => ({
  getLogger: vi.fn(() => ({
    info: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
    error: vi.fn(),
  })),
}));

describe('OutputManager', () => {
  let consoleLogSpy: MockInstance<(message?: unknown, ...optionalParams: unknown[]) => void>;
  let processExitSpy: MockInstance<(code?: number | string | null) => never>;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00.000Z'));
    process.env['NODE_ENV'] = 'test';

    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {
      // silence
    });
    processExitSpy = vi.spyOn(process, 'exit').mockImplementation((_code?: number | string | null) => {
      throw new Error('process.exit called');
    }) as never;

    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.useRealTimers();
    consoleLogSpy.mockRestore();
    processExitSpy.mockRestore();
  });

  it('should default to text format', () => {
    const output = new OutputManager();

    expect(output.isTextMode()).toBe(true);
    expect(output.isJsonMode()).toBe(false);
  });

  describe('json', () => {
    it('should print a success response with the duration', () => {
      const output = new OutputManager('json');
      vi.advanceTimersByTime(25);

      output.json('apply', { outputs: ['a.csv'] });

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      expect(JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]))).toEqual({
        success: true,
        command: 'apply',
        timestamp: '2024-01-01T00:00:00.025Z',
        data: { outputs: ['a.csv'] },
        metadata: { duration_ms: 25 },
      });
    });

    it('should print nothing in text mode', () => {
      new OutputManager('text').json('apply', {});

      expect(consoleLogSpy).not.toHaveBeenCalled();
    });
  });

  describe('error', () => {
    it('should print a JSON error and exit with the code', () => {
      const output = new OutputManager('json');

      expect(() => output.error('inspect', new Error('missing'), ExitCodes.NOT_FOUND)).toThrow('process.exit called');

      expect(processExitSpy).toHaveBeenCalledWith(4);
      expect(JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]))).toMatchObject({
        success: false,
        command: 'inspect',
        error: { code: 'NOT_FOUND', message: 'missing' },
      });
    });

    it('should show a tip for configuration errors in text mode', () => {
      const output = new OutputManager('text');

      expect(() => output.error('apply', new Error('bad rules'), ExitCodes.CONFIG_ERROR)).toThrow(
        'process.exit called'
      );

      expect(p.log.error).toHaveBeenCalledTimes(1);
      expect(p.note).toHaveBeenCalledWith(
        'Check the rules file. Run `burnish inspect <rules-file>` to see what it contains.',
        'Tip'
      );
      expect(processExitSpy).toHaveBeenCalledWith(11);
    });
  });

  describe('text helpers', () => {
    it('should route messages to clack in text mode', () => {
      const output = new OutputManager('text');

      output.intro('burnish apply');
      output.info('Loaded');
      output.outro('done');

      expect(p.intro).toHaveBeenCalledTimes(1);
      expect(p.log.info).toHaveBeenCalledWith('Loaded');
      expect(p.outro).toHaveBeenCalledWith('done');
    });

    it('should stay quiet in JSON mode', () => {
      const output = new OutputManager('json');

      output.intro('burnish apply');
      output.note('x');
      output.outro('done');

      expect(p.intro).not.toHaveBeenCalled();
      expect(p.note).not.toHaveBeenCalled();
      expect(p.outro).not.toHaveBeenCalled();
    });
  });
});
