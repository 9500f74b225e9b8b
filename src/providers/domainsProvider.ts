/**
 * Sources of line-oriented lists: public suffix rules, disposable and free
 * provider domains, role-based usernames.
 *
 * Every provider yields normalised entries: trimmed, lower-cased,
 * IDN labels punycoded. Blank lines and "//" comment lines are dropped.
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import { DataSource } from '../config/options';
import { ConnectionError } from '../utils/errors';
import { HttpClient } from '../utils/http';
import { toAsciiHostname } from '../utils/idn';
import { logger } from '../utils/logger';

const log = logger.child('providers');

export const DATA_DIR = join(__dirname, '..', '..', 'data');

export interface DomainsProvider {
  provide(): Promise<Set<string>>;
  /** Human readable origin, for logs */
  readonly description: string;
}

/**
 * Normalise one list entry. Returns null for entries that carry nothing.
 */
export function normalizeEntry(raw: string): string | null {
  const trimmed = raw.trim();
  if (trimmed === '' || trimmed.startsWith('//')) {
    return null;
  }
  // anything after the first whitespace is a trailing comment
  const [token] = trimmed.split(/\s+/);
  return toAsciiHostname(token);
}

export function parseLineList(text: string): Set<string> {
  const entries = new Set<string>();
  for (const line of text.split(/\r?\n/)) {
    const entry = normalizeEntry(line);
    if (entry !== null) {
      entries.add(entry);
    }
  }
  return entries;
}

export class RemoteListProvider implements DomainsProvider {
  readonly description: string;

  constructor(
    private readonly url: string,
    private readonly http: HttpClient
  ) {
    this.description = url;
  }

  async provide(): Promise<Set<string>> {
    log.debug(`Downloading list from ${this.url}`);
    const response = await this.http.get(this.url);

    if (response.status >= 400) {
      throw new ConnectionError(`GET ${this.url} returned HTTP ${response.status}`);
    }

    const entries = parseLineList(response.body.toString('utf8'));
    log.info(`Loaded ${entries.size} entries from ${this.url}`);
    return entries;
  }
}

export class FileListProvider implements DomainsProvider {
  readonly description: string;

  constructor(private readonly path: string) {
    this.description = path;
  }

  async provide(): Promise<Set<string>> {
    const text = await fs.readFile(this.path, 'utf8');
    const entries = parseLineList(text);
    log.debug(`Loaded ${entries.size} entries from ${this.path}`);
    return entries;
  }
}

/**
 * A list shipped with the package under data/<name>.txt
 */
export class BundledListProvider extends FileListProvider {
  constructor(name: string) {
    super(join(DATA_DIR, `${name}.txt`));
  }
}

export class StaticListProvider implements DomainsProvider {
  readonly description = 'inline list';

  constructor(private readonly entries: readonly string[]) {}

  async provide(): Promise<Set<string>> {
    return parseLineList(this.entries.join('\n'));
  }
}

export function createProvider(source: DataSource, http: HttpClient): DomainsProvider {
  switch (source.kind) {
    case 'remote':
      return new RemoteListProvider(source.url, http);
    case 'bundled':
      return new BundledListProvider(source.name);
    case 'file':
      return new FileListProvider(source.path);
    case 'inline':
      return new StaticListProvider(source.entries);
  }
}
