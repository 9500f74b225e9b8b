/**
 * MX record lookup.
 * Backends: DNS-over-HTTPS JSON (default) or the system resolver, optionally
 * behind a TTL cache. Records are returned most-preferred first.
 */

import { promises as dns } from 'dns';
import { z } from 'zod';
import { AddressParts, MxData, MxRecord } from '../types/email';
import { ICache } from '../utils/cache';
import { ConnectionError, errorMessage } from '../utils/errors';
import { HttpClient } from '../utils/http';
import { logger } from '../utils/logger';
import { Checker } from './checker';

const log = logger.child('mx');

const MX_RECORD_TYPE = 15;

export interface DnsLookupBackend {
  /**
   * @returns records sorted by ascending priority; empty when the name has none
   * @throws ConnectionError when the lookup itself failed
   */
  getMxRecords(hostname: string): Promise<MxRecord[]>;
}

export function sortByPriority(records: readonly MxRecord[]): MxRecord[] {
  return [...records].sort((a, b) => a.priority - b.priority);
}

const DohAnswerSchema = z.object({
  name: z.string().optional(),
  type: z.number(),
  data: z.string(),
});

const DohResponseSchema = z.object({
  Status: z.number().optional(),
  Answer: z.array(z.unknown()).optional(),
});

/**
 * Parse MX answer data of the form "<priority> <exchange>."
 * Returns null for malformed data and for the null MX ("0 .").
 */
export function parseMxData(data: string): MxRecord | null {
  const fields = data.trim().split(/\s+/);
  if (fields.length !== 2 || !/^\d+$/.test(fields[0])) {
    return null;
  }

  const exchange = fields[1].replace(/\.$/, '').toLowerCase();
  if (exchange === '') {
    return null;
  }

  return { priority: parseInt(fields[0], 10), exchange };
}

export class DohLookupBackend implements DnsLookupBackend {
  constructor(
    private readonly http: HttpClient,
    private readonly endpoint: string
  ) {}

  async getMxRecords(hostname: string): Promise<MxRecord[]> {
    const url = new URL(this.endpoint);
    url.searchParams.set('name', hostname);
    url.searchParams.set('type', 'MX');

    const response = await this.http.get(url.toString(), {
      headers: { accept: 'application/dns-json' },
    });

    if (response.status >= 400) {
      throw new ConnectionError(`DNS-over-HTTPS query for ${hostname} returned HTTP ${response.status}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(response.body.toString('utf8'));
    } catch (error) {
      throw new ConnectionError(`DNS-over-HTTPS response for ${hostname} is not valid JSON`, { cause: error });
    }

    const parsed = DohResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new ConnectionError(`Unexpected DNS-over-HTTPS response for ${hostname}: ${parsed.error.message}`);
    }

    const records: MxRecord[] = [];
    for (const entry of parsed.data.Answer ?? []) {
      const answer = DohAnswerSchema.safeParse(entry);
      if (!answer.success) {
        log.warn(`Skipping malformed DNS answer for ${hostname}`, { entry });
        continue;
      }
      if (answer.data.type !== MX_RECORD_TYPE) {
        continue;
      }

      const record = parseMxData(answer.data.data);
      if (!record) {
        log.debug(`Skipping null or unparsable MX data for ${hostname}`, { data: answer.data.data });
        continue;
      }
      records.push(record);
    }

    return sortByPriority(records);
  }
}

type ResolveMx = (hostname: string) => Promise<MxRecord[]>;

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Lookups through the operating system's resolver
 */
export class NativeDnsLookupBackend implements DnsLookupBackend {
  constructor(private readonly resolveMx: ResolveMx = hostname => dns.resolveMx(hostname)) {}

  async getMxRecords(hostname: string): Promise<MxRecord[]> {
    try {
      const records = await this.resolveMx(hostname);
      return sortByPriority(
        records
          .map(record => ({ exchange: record.exchange.toLowerCase(), priority: record.priority }))
          .filter(record => record.exchange !== '')
      );
    } catch (error) {
      const code = errorCode(error);

      // Domain doesn't exist or has no MX records
      if (code === 'ENOTFOUND' || code === 'ENODATA') {
        log.debug(`No MX records for ${hostname}`, { code });
        return [];
      }

      throw new ConnectionError(`MX lookup for ${hostname} failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}

const CachedRecordsSchema = z.array(z.object({ exchange: z.string(), priority: z.number() }));

/**
 * Caches answers (including empty ones) for `ttlMs`. Failures are not cached.
 */
export class CachedDnsLookupBackend implements DnsLookupBackend {
  constructor(
    private readonly backend: DnsLookupBackend,
    private readonly cache: ICache,
    private readonly ttlMs: number
  ) {}

  async getMxRecords(hostname: string): Promise<MxRecord[]> {
    const key = `mx:${hostname}`;
    const cached = await this.cache.get(key);

    if (cached !== null) {
      const parsed = CachedRecordsSchema.safeParse(safeJsonParse(cached));
      if (parsed.success) {
        log.debug(`MX cache hit for ${hostname}`);
        return parsed.data;
      }
      log.warn(`Discarding unreadable MX cache entry for ${hostname}`);
      await this.cache.delete(key);
    }

    const records = await this.backend.getMxRecords(hostname);
    if (this.ttlMs > 0) {
      await this.cache.set(key, JSON.stringify(records), this.ttlMs);
    }
    return records;
  }
}

function safeJsonParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export class MxRecordChecker implements Checker<MxData> {
  constructor(private readonly backend: DnsLookupBackend) {}

  async check(parts: AddressParts): Promise<MxData> {
    const records = await this.backend.getMxRecords(parts.hostname);
    log.debug(`MX lookup for ${parts.hostname}`, { recordCount: records.length });
    return { records };
  }
}
