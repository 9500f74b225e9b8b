/**
 * Registrable-domain lookup over public suffix rules.
 *
 * Rules are stored in a trie keyed by label, TLD first. A rebuild creates
 * a new trie and swaps it in; lookups always see a complete tree.
 */

import { AddressParts, RegistrabilityData } from '../types/email';
import { DomainsProvider } from '../providers/domainsProvider';
import { logger } from '../utils/logger';
import { Snapshot } from '../utils/snapshot';
import { Checker, Refreshable } from './checker';

const log = logger.child('registrability');

const RULE_PATTERN = /^(!)?(\*\.)?([a-z0-9-]+\.)*[a-z0-9-]+$/;
const WILDCARD = '*';

interface SuffixNode {
  children: Map<string, SuffixNode>;
  isSuffix: boolean;
  isException: boolean;
  isWildcard: boolean;
}

function createNode(): SuffixNode {
  return { children: new Map(), isSuffix: false, isException: false, isWildcard: false };
}

export class SuffixTrie {
  private readonly root: SuffixNode = createNode();
  private ruleCount = 0;

  /**
   * Build a trie from rules; malformed rules are logged and skipped.
   */
  static fromRules(rules: Iterable<string>): SuffixTrie {
    const trie = new SuffixTrie();
    let skipped = 0;

    for (const rule of rules) {
      if (!trie.insert(rule)) {
        skipped++;
        log.warn(`Skipping malformed suffix rule: "${rule}"`);
      }
    }

    log.debug(`Suffix trie built`, { rules: trie.size, skipped });
    return trie;
  }

  get size(): number {
    return this.ruleCount;
  }

  /**
   * Insert one rule ("co.uk", "*.ck", "!www.ck").
   * @returns false if the rule is malformed
   */
  insert(rule: string): boolean {
    const normalized = rule.trim().toLowerCase();
    if (!RULE_PATTERN.test(normalized)) {
      return false;
    }

    const isException = normalized.startsWith('!');
    const labels = (isException ? normalized.slice(1) : normalized).split('.').reverse();

    let node = this.root;
    for (const label of labels) {
      let child = node.children.get(label);
      if (!child) {
        child = createNode();
        node.children.set(label, child);
      }
      if (label === WILDCARD) {
        child.isWildcard = true;
      }
      node = child;
    }

    if (isException) {
      node.isException = true;
    } else {
      node.isSuffix = true;
    }

    this.ruleCount++;
    return true;
  }

  /**
   * The registrable domain of `hostname`: the matched public suffix plus
   * one label. Null when the hostname is itself a suffix, has a single
   * label, or matches no rule.
   */
  findRegistrableDomain(hostname: string): string | null {
    const labels = hostname.toLowerCase().split('.');
    if (labels.length < 2) {
      return null;
    }

    const reversed = [...labels].reverse();
    let node = this.root;
    let suffixDepth = 0;

    for (let i = 0; i < reversed.length; i++) {
      const child = node.children.get(reversed[i]) ?? node.children.get(WILDCARD);
      if (!child) {
        break;
      }

      if (child.isException) {
        // an exception names a registrable domain directly
        return labels.slice(labels.length - (i + 1)).join('.');
      }

      if (child.isSuffix || child.isWildcard) {
        suffixDepth = i + 1;
      }
      node = child;
    }

    if (suffixDepth === 0 || labels.length <= suffixDepth) {
      return null;
    }

    return labels.slice(labels.length - (suffixDepth + 1)).join('.');
  }
}

export class RegistrabilityChecker implements Checker<RegistrabilityData>, Refreshable {
  private readonly trie = new Snapshot<SuffixTrie>(new SuffixTrie());

  constructor(
    private readonly provider: DomainsProvider,
    private readonly customRules: readonly string[] = []
  ) {}

  /**
   * Rebuild the trie from the provider, then the custom rules.
   * On failure the current trie stays in use.
   */
  async refresh(): Promise<void> {
    await this.trie.replace(async () => {
      const rules = await this.provider.provide();
      log.info(`Loaded ${rules.size} suffix rules from ${this.provider.description}`);
      return SuffixTrie.fromRules([...rules, ...this.customRules]);
    });
  }

  findRegistrableDomain(hostname: string): string | null {
    return this.trie.get().findRegistrableDomain(hostname);
  }

  async check(parts: AddressParts): Promise<RegistrabilityData> {
    return { registrableDomain: this.findRegistrableDomain(parts.hostname) };
  }
}
