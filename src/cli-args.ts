/**
 * Command-line parsing: `<mode> --key=value --flag`
 *
 * Keys are camel-cased (`--max-items=5` -> maxItems). Numeric options are
 * converted here; everything else is validated by the run config schema.
 */

const NUMBER_OPTIONS = new Set([
  'maxItems',
  'pageSize',
  'delayMs',
  'listingDelayMs',
  'checkpointEvery',
  'maxPages',
  'concurrency',
]);

const FILE_OPTIONS = {
  seedFile: 'seedUrls',
  knownProductsFile: 'knownProductUrls',
  knownCategoriesFile: 'knownCategoryUrls',
} as const;

type FileOption = keyof typeof FILE_OPTIONS;
export type ListOption = (typeof FILE_OPTIONS)[FileOption];

export interface ParsedCliArgs {
  /** Raw run options, to be validated */
  options: Record<string, unknown>;
  /** Newline-delimited files whose lines fill a list option */
  files: Partial<Record<ListOption, string>>;
}

function camelCase(key: string): string {
  return key.replace(/-([a-z])/g, (_, letter: string) => letter.toUpperCase());
}

function isFileOption(key: string): key is FileOption {
  return key in FILE_OPTIONS;
}

function convert(key: string, value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (NUMBER_OPTIONS.has(key) && value.trim() !== '' && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return value;
}

export function parseCliArgs(argv: readonly string[]): ParsedCliArgs {
  const options: Record<string, unknown> = {};
  const files: Partial<Record<ListOption, string>> = {};

  for (const arg of argv) {
    if (!arg.startsWith('--')) {
      if (options.mode === undefined) {
        options.mode = arg;
      }
      continue;
    }

    const [rawKey, ...rest] = arg.slice(2).split('=');
    const key = camelCase(rawKey);
    const value = rest.length > 0 ? rest.join('=') : 'true';

    if (isFileOption(key)) {
      files[FILE_OPTIONS[key]] = value;
    } else {
      options[key] = convert(key, value);
    }
  }

  return { options, files };
}
