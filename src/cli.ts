import { parseCount, parseExtraColumns, parseSink, type SyncConfig } from './config/sync.js';

export type CliArgs = Record<string, string | boolean | string[]>;

export function parseCliArgs(tokens: string[]): CliArgs {
  const result: CliArgs = {};

  for (let i = 0; i < tokens.length; i++) {
    let token = tokens[i];
    if (token === '--') continue;
    if (!token.startsWith('--')) continue;

    token = token.slice(2);
    if (!token) continue;

    let value: string | boolean = true;
    let key = token;

    if (token.includes('=')) {
      const [k, v] = token.split(/=(.*)/s, 2);
      key = k;
      value = v ?? true;
    } else {
      const next = tokens[i + 1];
      if (next && !next.startsWith('--')) {
        value = next;
        i++;
      }
    }

    const existing = result[key];
    if (existing === undefined) {
      result[key] = value;
    } else if (Array.isArray(existing)) {
      existing.push(String(value));
    } else {
      result[key] = [String(existing), String(value)];
    }
  }

  return result;
}

export function getStringArg(args: CliArgs, key: string): string | undefined {
  const value = args[key];
  if (value === undefined) return undefined;
  if (Array.isArray(value)) return value[value.length - 1];
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  return value;
}

export function getStringArrayArg(args: CliArgs, key: string): string[] | undefined {
  const value = args[key];
  if (value === undefined) return undefined;
  if (Array.isArray(value)) return value;
  return [String(value)];
}

function normalizeBoolean(value: string): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return undefined;
}

export function resolveBooleanFlag(cliValue: unknown): boolean | undefined {
  if (Array.isArray(cliValue)) {
    cliValue = cliValue[cliValue.length - 1];
  }
  if (typeof cliValue === 'boolean') return cliValue;
  if (typeof cliValue === 'string') {
    const parsed = normalizeBoolean(cliValue);
    if (parsed === undefined) {
      throw new Error(`Expected a boolean flag value, got "${cliValue}".`);
    }
    return parsed;
  }
  return undefined;
}

function numberArg(args: CliArgs, key: string): number | undefined {
  const raw = getStringArg(args, key);
  return raw === undefined ? undefined : parseCount(`--${key}`, raw, 0);
}

/** Maps command-line flags onto config overrides; flags that were not given stay unset. */
export function resolveCliOverrides(args: CliArgs): Partial<SyncConfig> {
  const overrides: Partial<SyncConfig> = {};

  const username = getStringArg(args, 'username');
  if (username) overrides.username = username;

  const requestDelayMs = numberArg(args, 'delay-ms');
  if (requestDelayMs !== undefined) overrides.requestDelayMs = requestDelayMs;

  const folderId = numberArg(args, 'folder');
  if (folderId !== undefined) overrides.folderId = folderId;

  const perPage = numberArg(args, 'per-page');
  if (perPage !== undefined) overrides.perPage = perPage;

  const includeFullRelease = resolveBooleanFlag(args['include-full-release']);
  if (includeFullRelease !== undefined) overrides.includeFullRelease = includeFullRelease;

  const extraColumns = getStringArrayArg(args, 'extra-column');
  if (extraColumns) overrides.extraColumns = parseExtraColumns(extraColumns.join(','));

  const sink = getStringArg(args, 'sink');
  if (sink) overrides.sink = parseSink(sink);

  const dataRoot = getStringArg(args, 'data-root');
  if (dataRoot) overrides.dataRoot = dataRoot;

  const table = getStringArg(args, 'table');
  if (table) overrides.table = table;

  const skipDiffs = resolveBooleanFlag(args['skip-diffs']);
  if (skipDiffs !== undefined) overrides.skipDiffs = skipDiffs;

  return overrides;
}
