import path from 'node:path';

import { getDefaultWorkerCount, getOutputSuffix } from '@burnish/env';
import { getLogger } from '@burnish/logger';
import type { SourceOptions, TableRecord } from '@burnish/tables';
import { createRecordSink, discoverFiles, openRecordSource, releaseResources } from '@burnish/tables';

import { ConfigurationError, getErrorMessage } from './errors.js';
import { normalizeRecords, type RecordNormalizer } from './normalizer.js';

const logger = getLogger('runner');

export type ApplyOptions = SourceOptions;

export type OutputNameGenerator = (inputFile: string) => string;

export type ApplyAllOptions = ApplyOptions & {
  /** Files processed at once; defaults to BURNISH_MAX_WORKERS or the CPU count */
  maxWorkers?: number | undefined;
  nameGenerator?: OutputNameGenerator | undefined;
  /** Directory relative patterns are resolved against */
  cwd?: string | undefined;
};

export interface FileOutcome {
  readonly input: string;
  readonly output: string;
}

/**
 * `<dir>/<base>.<suffix><ext>` beside the input file.
 */
export function defaultOutputName(inputFile: string, suffix: string = getOutputSuffix()): string {
  const { dir, ext, name } = path.parse(inputFile);
  return path.join(dir, `${name}.${suffix}${ext}`);
}

async function collect(records: AsyncIterable<TableRecord>): Promise<TableRecord[]> {
  const collected: TableRecord[] = [];
  for await (const record of records) {
    collected.push(record);
  }
  return collected;
}

/**
 * Normalize one file into `toFile`. When both name the same file every
 * record is read before the destination is truncated.
 */
export async function applyToFile(
  normalizer: RecordNormalizer,
  fromFile: string,
  toFile: string,
  options: ApplyOptions = {}
): Promise<string> {
  const source = openRecordSource(fromFile, options);
  try {
    const sink = createRecordSink(toFile);
    const normalized = normalizeRecords(source.records(), normalizer);
    const records = path.resolve(fromFile) === path.resolve(toFile) ? await collect(normalized) : normalized;
    const written = await sink.write(records, () => normalizer.header(source.columns));
    logger.debug({ fromFile, records: written, toFile }, 'Normalized file');
    return toFile;
  } finally {
    await source.close();
  }
}

/**
 * Run `task` over `items` with at most `limit` tasks in flight. Every item is
 * attempted; results keep the order of `items`.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  const results = new Array<PromiseSettledResult<R>>(items.length);
  const queue = items.entries();

  const worker = async (): Promise<void> => {
    for (const [index, item] of queue) {
      try {
        results[index] = { status: 'fulfilled', value: await task(item) };
      } catch (reason) {
        results[index] = { reason, status: 'rejected' };
      }
    }
  };

  await Promise.all(Array.from({ length: Math.min(limit, items.length) }, worker));
  return results;
}

/**
 * Normalize every file matching `pattern`. Outputs are listed in completion
 * order. When any file fails, the first failure is thrown once all files have
 * been attempted. Pooled resources are released once at the end.
 */
export async function applyToFiles(
  normalizer: RecordNormalizer,
  pattern: string,
  options: ApplyAllOptions = {}
): Promise<string[]> {
  const { cwd, maxWorkers, nameGenerator, ...sourceOptions } = options;
  const workers = maxWorkers ?? getDefaultWorkerCount();
  if (!Number.isInteger(workers) || workers < 1) {
    throw new ConfigurationError(`maxWorkers must be a positive integer, got ${workers}`, { maxWorkers: workers });
  }
  const outputName = nameGenerator ?? ((inputFile: string) => defaultOutputName(inputFile));

  try {
    const files = await discoverFiles(pattern, { cwd });
    logger.info({ files: files.length, pattern, workers }, 'Applying pipeline to matched files');

    const completed: string[] = [];
    const outcomes = await mapWithConcurrency(files, workers, async (inputFile) => {
      const output = await applyToFile(normalizer, inputFile, outputName(inputFile), sourceOptions);
      completed.push(output);
      return output;
    });

    const failures = outcomes.flatMap((outcome, index) =>
      outcome.status === 'rejected' ? [{ file: files[index], reason: outcome.reason }] : []
    );
    for (const failure of failures) {
      logger.error({ error: getErrorMessage(failure.reason), file: failure.file }, 'Failed to normalize file');
    }
    const [firstFailure] = failures;
    if (firstFailure) {
      throw firstFailure.reason;
    }
    return completed;
  } finally {
    releaseResources();
  }
}
