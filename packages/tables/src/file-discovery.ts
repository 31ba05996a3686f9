import { globby } from 'globby';

export interface DiscoverOptions {
  cwd?: string | undefined;
}

/**
 * Expand a glob (wildcards, brace alternatives and ranges) into the sorted
 * absolute paths of matching regular files.
 */
export async function discoverFiles(pattern: string, options: DiscoverOptions = {}): Promise<string[]> {
  const matches = await globby(pattern, {
    absolute: true,
    cwd: options.cwd,
    expandDirectories: false,
    onlyFiles: true,
  });
  return matches.sort();
}
