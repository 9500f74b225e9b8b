/**
 * Membership checks against domain and username lists
 * (disposable domains, free mailbox providers, role-based usernames).
 *
 * Precedence: allow list, then deny list, then the provider's base set.
 */

import { AddressParts, DatasetData } from '../types/email';
import { DomainsProvider, normalizeEntry } from '../providers/domainsProvider';
import { logger } from '../utils/logger';
import { Snapshot } from '../utils/snapshot';
import { Checker, Refreshable } from './checker';

const log = logger.child('dataset');

export interface DatasetCheckerOptions {
  allow?: readonly string[];
  deny?: readonly string[];
}

function toSet(entries: readonly string[]): ReadonlySet<string> {
  const set = new Set<string>();
  for (const entry of entries) {
    const normalized = normalizeEntry(entry);
    if (normalized !== null) set.add(normalized);
  }
  return set;
}

function firstIn(set: ReadonlySet<string>, candidates: readonly string[]): string | undefined {
  return candidates.find(candidate => set.has(candidate));
}

/**
 * The hostname and each parent domain down to the last two labels,
 * longest first. Single-label hostnames yield nothing.
 */
export function hostnameCandidates(hostname: string): string[] {
  const labels = hostname.split('.');
  const candidates: string[] = [];
  for (let i = 0; i < labels.length - 1; i++) {
    candidates.push(labels.slice(i).join('.'));
  }
  return candidates;
}

abstract class DatasetChecker implements Checker<DatasetData>, Refreshable {
  private readonly base = new Snapshot<ReadonlySet<string>>(new Set());
  private readonly allow: ReadonlySet<string>;
  private readonly deny: ReadonlySet<string>;

  constructor(
    readonly name: string,
    private readonly provider: DomainsProvider,
    options: DatasetCheckerOptions = {}
  ) {
    this.allow = toSet(options.allow ?? []);
    this.deny = toSet(options.deny ?? []);
  }

  protected abstract candidates(parts: AddressParts): string[];

  async refresh(): Promise<void> {
    await this.base.replace(async () => {
      const entries = await this.provider.provide();
      log.info(`${this.name}: loaded ${entries.size} entries from ${this.provider.description}`);
      return entries;
    });
  }

  async check(parts: AddressParts): Promise<DatasetData> {
    return this.match(this.candidates(parts));
  }

  match(candidates: readonly string[]): DatasetData {
    const allowed = firstIn(this.allow, candidates);
    if (allowed !== undefined) {
      return { match: false, matchedOn: allowed, source: 'allow' };
    }

    const denied = firstIn(this.deny, candidates);
    if (denied !== undefined) {
      return { match: true, matchedOn: denied, source: 'deny' };
    }

    const listed = firstIn(this.base.get(), candidates);
    if (listed !== undefined) {
      return { match: true, matchedOn: listed, source: 'default' };
    }

    return { match: false, matchedOn: null, source: null };
  }
}

/**
 * Matches the hostname or any of its parent domains
 */
export class HostnameInDatasetChecker extends DatasetChecker {
  protected candidates(parts: AddressParts): string[] {
    return hostnameCandidates(parts.hostname);
  }
}

/**
 * Matches the username exactly (case-insensitive)
 */
export class UsernameInDatasetChecker extends DatasetChecker {
  protected candidates(parts: AddressParts): string[] {
    return [parts.username.toLowerCase()];
  }
}
