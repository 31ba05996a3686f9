import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

const { mockWarn } = vi.hoisted(() => ({ mockWarn: vi.fn() }));

vi.mock('@burnish/logger', () => ({
  getLogger: () => ({
    debug: vi.fn(),
    error: vi.fn(),
    info: vi.fn(),
    trace: vi.fn(),
    warn: mockWarn,
  }),
}));

import { ConfigurationError, SerializationError, UnknownRuleError } from '../errors.js';
import { Pipeline } from '../pipeline.js';

import { assertErr, assertOk, normalizeWith, record } from './test-utils.js';

const roundTrip = (pipeline: Pipeline): unknown => JSON.parse(JSON.stringify(pipeline.export()));

describe('pipeline serialization', () => {
  beforeEach(() => {
    mockWarn.mockClear();
  });

  it('should export rules, arguments and options in registration order', () => {
    const pipeline = new Pipeline('contacts')
      .strip()
      .substitute({ '^N/A$': null }, { columnFilter: '^email$' })
      .orderColumns(['email'], { ignoreMissing: true });

    expect(pipeline.export()).toEqual({
      name: 'contacts',
      rules: [
        ['strip', [], {}],
        ['substitute', [{ '^N/A$': null }], { columnFilter: '^email$' }],
        ['orderColumns', [['email']], { ignoreMissing: true }],
      ],
      uid: pipeline.uid,
    });
    expect(mockWarn).not.toHaveBeenCalled();
  });

  it('should keep the uid across export and load for every built-in rule', () => {
    const pipeline = new Pipeline('everything')
      .lower({ columnFilter: /^email$/ })
      .upper({ valueFilter: '^[a-z]{2}$' })
      .capitalize()
      .title()
      .strip({ chars: ' -' })
      .lstrip()
      .rstrip()
      .increment({ amount: 2, columnFilter: '^qty$' })
      .decrement()
      .replace([['&', 'and']])
      .substitute([[/^x$/, 'y']])
      .translateText({ '(\\d+)': '#{0}' })
      .translateDate({ 'YYYY-MM-DD': 'DD.MM.YYYY' }, { columnFilter: '_on$' })
      .addColumns({ source: 'import', total: 0 })
      .removeColumns(['tmp'])
      .renameColumns({ mail: 'email' })
      .orderColumns(['email', 'name']);

    const loaded = assertOk(Pipeline.load(roundTrip(pipeline)));

    expect(loaded.uid).toBe(pipeline.uid);
    expect(loaded.equals(pipeline)).toBe(true);
    expect(loaded.name).toBe('everything');
    expect(loaded.rules.map((entry) => entry.kind)).toEqual(pipeline.rules.map((entry) => entry.kind));
    expect(mockWarn).not.toHaveBeenCalled();
  });

  it('should not follow changes to argument objects made after registration', () => {
    const replacements: Record<string, string> = { a: 'b' };
    const columns = ['notes'];
    const pipeline = new Pipeline().replace(replacements).removeColumns(columns);
    const uid = pipeline.uid;

    replacements['a'] = 'c';
    columns.push('id');

    expect(pipeline.uid).toBe(uid);
    expect(pipeline.export().rules).toEqual([
      ['replace', [{ a: 'b' }], {}],
      ['removeColumns', [['notes']], {}],
    ]);

    const loaded = assertOk(Pipeline.load(roundTrip(pipeline)));
    const input = record([
      ['id', 'a1'],
      ['notes', 'x'],
    ]);
    expect(loaded.equals(pipeline)).toBe(true);
    expect(normalizeWith(loaded, input)).toEqual([['id', 'b1']]);
    expect(normalizeWith(pipeline, input)).toEqual([['id', 'b1']]);
  });

  it('should freeze stored arguments and options', () => {
    const [registration] = new Pipeline().replace([['a', 'b']], { columnFilter: '^id$' }).rules;

    expect(Object.isFrozen(registration?.args)).toBe(true);
    expect(Object.isFrozen(registration?.args[0])).toBe(true);
    expect(Object.isFrozen(registration?.options)).toBe(true);
  });

  it('should leave an unnamed pipeline unnamed after loading', () => {
    const loaded = assertOk(Pipeline.load(roundTrip(new Pipeline().lower())));

    expect(loaded.name).toBe(loaded.uid);
    loaded.upper();
    expect(loaded.name).toBe(loaded.uid);
  });

  it('should export callables as null and warn about the lossy round trip', () => {
    function isShort(): boolean {
      return true;
    }
    const pipeline = new Pipeline().lower({ callableFilter: isShort });

    const envelope = pipeline.export();

    expect(envelope.rules).toEqual([['lower', [], { callableFilter: null }]]);
    expect(mockWarn).toHaveBeenCalledWith(
      { index: 0, path: '$.options.callableFilter', reason: 'callable', rule: 'lower' },
      'Callable argument exported as null; a loaded pipeline will not match this one'
    );

    const loaded = assertOk(Pipeline.load(envelope));

    expect(loaded.uid).not.toBe(pipeline.uid);
    expect(mockWarn).toHaveBeenLastCalledWith(
      { expected: pipeline.uid, name: loaded.uid, received: loaded.uid },
      'Loaded pipeline uid does not match the envelope; some rules did not round-trip'
    );
  });

  it('should export RegExp flags as the bare source with a warning', () => {
    const envelope = new Pipeline().lower({ columnFilter: /^email$/i }).export();

    expect(envelope.rules).toEqual([['lower', [], { columnFilter: '^email$' }]]);
    expect(mockWarn).toHaveBeenCalledWith(
      { index: 0, path: '$.options.columnFilter', reason: 'regexp-flags', rule: 'lower' },
      'RegExp flags cannot be exported and were dropped'
    );
  });

  it('should export dates as ISO strings', () => {
    const envelope = new Pipeline().addColumns({ since: new Date('2024-01-01T00:00:00.000Z') }).export();

    expect(envelope.rules).toEqual([['addColumns', [{ since: '2024-01-01T00:00:00.000Z' }], {}]]);
  });

  it('should reject envelopes of the wrong shape', () => {
    const error = assertErr(Pipeline.load({ name: 'x' }));

    expect(error).toBeInstanceOf(SerializationError);
    expect(error.message).toMatch(/^Invalid pipeline envelope: /);
  });

  it('should reject unknown rules', () => {
    const error = assertErr(Pipeline.load({ name: 'x', rules: [['explode', [], {}]], uid: 'a'.repeat(40) }));

    expect(error).toBeInstanceOf(UnknownRuleError);
    expect(error.message).toBe('Unknown rule "explode"');
  });

  it('should reject rule arguments that do not validate', () => {
    const error = assertErr(Pipeline.load({ name: 'x', rules: [['replace', [42], {}]], uid: 'a'.repeat(40) }));

    expect(error).toBeInstanceOf(ConfigurationError);
  });

  it('should warn and still load when the uid does not match', () => {
    const loaded = assertOk(Pipeline.load({ name: 'renamed', rules: [['lower', [], {}]], uid: 'a'.repeat(40) }));

    expect(loaded.name).toBe('renamed');
    expect(loaded.rules).toHaveLength(1);
    expect(mockWarn).toHaveBeenCalledTimes(1);
  });

  it('should reject an empty name', () => {
    const error = assertErr(Pipeline.load({ name: '', rules: [], uid: 'a'.repeat(40) }));

    expect(error).toBeInstanceOf(SerializationError);
  });
});

describe('rule files', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'burnish-rules-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { force: true, recursive: true });
  });

  it('should write the envelope as JSON and load it back', async () => {
    const pipeline = new Pipeline('files').strip().renameColumns({ a: 'b' });
    const file = path.join(tempDir, 'rules.json');

    expect(assertOk(await pipeline.exportToFile(file))).toBe(file);
    expect(await fs.readFile(file, 'utf8')).toBe(`${JSON.stringify(pipeline.export(), undefined, 2)}\n`);

    const loaded = assertOk(await Pipeline.loadFromFile(file));
    expect(loaded.uid).toBe(pipeline.uid);
    expect(loaded.name).toBe('files');
  });

  it('should fail when the export directory does not exist', async () => {
    const error = assertErr(await new Pipeline().exportToFile(path.join(tempDir, 'missing', 'rules.json')));

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error.message).toBe(`Export directory does not exist: ${path.join(tempDir, 'missing')}`);
  });

  it('should report files that are not JSON', async () => {
    const file = path.join(tempDir, 'broken.json');
    await fs.writeFile(file, '{not json');

    const error = assertErr(await Pipeline.loadFromFile(file));

    expect(error).toBeInstanceOf(SerializationError);
    expect(error.message.startsWith(`Invalid JSON in ${file}: `)).toBe(true);
  });

  it('should report files that cannot be read', async () => {
    const error = assertErr(await Pipeline.loadFromFile(path.join(tempDir, 'absent.json')));

    expect(error.message).toMatch(/ENOENT/);
  });
});
