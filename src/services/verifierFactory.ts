/**
 * Builds a ready-to-use EmailVerifier from options: resolves configuration,
 * wires providers and collaborators, and loads every dataset.
 */

import { config } from '../config/env';
import { ResolvedDataset, VerifierConfig, VerifierOptions, resolveConfig } from '../config/options';
import { createProvider } from '../providers/domainsProvider';
import { ICache, createCache } from '../utils/cache';
import { FetchHttpClient, HttpClient } from '../utils/http';
import { logger } from '../utils/logger';
import { AvatarChecker } from '../validators/avatarValidator';
import { Refreshable } from '../validators/checker';
import { HostnameInDatasetChecker, UsernameInDatasetChecker } from '../validators/datasetValidator';
import {
  CachedDnsLookupBackend,
  DnsLookupBackend,
  DohLookupBackend,
  MxRecordChecker,
  NativeDnsLookupBackend,
} from '../validators/dnsValidator';
import { RegistrabilityChecker } from '../validators/registrabilityValidator';
import { SmtpConnectionFactory } from '../validators/smtpConnection';
import { SmtpChecker } from '../validators/smtpValidator';
import { EmailVerifier, VerifierCheckers } from './emailValidationService';

const log = logger.child('factory');

/**
 * Collaborators that replace the defaults built from configuration
 */
export interface VerifierDependencies {
  http?: HttpClient;
  /** MX cache; defaults to Redis when REDIS_ENABLED, in-memory otherwise */
  cache?: ICache;
  /** Used as-is, without the MX cache */
  dnsBackend?: DnsLookupBackend;
  smtpConnect?: SmtpConnectionFactory;
}

function datasetChecker(
  name: string,
  settings: ResolvedDataset,
  http: HttpClient,
  kind: 'hostname' | 'username'
): HostnameInDatasetChecker | UsernameInDatasetChecker | undefined {
  if (!settings.enabled) return undefined;

  const provider = createProvider(settings.source, http);
  const options = { allow: settings.allow, deny: settings.deny };

  return kind === 'hostname'
    ? new HostnameInDatasetChecker(name, provider, options)
    : new UsernameInDatasetChecker(name, provider, options);
}

function mxBackend(resolved: VerifierConfig, http: HttpClient, cache: ICache): DnsLookupBackend {
  const backend = resolved.mx.backend === 'doh'
    ? new DohLookupBackend(http, resolved.mx.dohEndpoint)
    : new NativeDnsLookupBackend();

  return new CachedDnsLookupBackend(backend, cache, resolved.mx.cacheTtlMs);
}

/**
 * Create a verifier and load its datasets.
 * @throws Error for invalid options, or the first dataset load failure
 */
export async function createEmailVerifier(
  options: VerifierOptions = {},
  deps: VerifierDependencies = {}
): Promise<EmailVerifier> {
  const resolved = resolveConfig(options);
  const http = deps.http ?? new FetchHttpClient(config.http);

  const registrability = resolved.registrability.enabled
    ? new RegistrabilityChecker(createProvider(resolved.registrability.source, http), resolved.registrability.customRules)
    : undefined;
  const disposable = datasetChecker('disposable', resolved.disposable, http, 'hostname');
  const free = datasetChecker('free', resolved.free, http, 'hostname');
  const roleBasedUsername = datasetChecker('roleBasedUsername', resolved.roleBasedUsername, http, 'username');

  let cache: ICache | undefined;
  let mx: MxRecordChecker | undefined;
  if (resolved.mx.enabled) {
    if (deps.dnsBackend) {
      mx = new MxRecordChecker(deps.dnsBackend);
    } else {
      cache = deps.cache ?? createCache(config.redis);
      mx = new MxRecordChecker(mxBackend(resolved, http, cache));
    }
  }

  const avatar = resolved.avatar.enabled ? new AvatarChecker(http, resolved.avatar.baseUrl) : undefined;

  const smtp = resolved.smtp.enabled
    ? new SmtpChecker({ ...resolved.smtp, connect: deps.smtpConnect })
    : undefined;

  const checkers: VerifierCheckers = { registrability, mx, disposable, avatar, free, roleBasedUsername, smtp };

  const datasets: Refreshable[] = [registrability, disposable, free, roleBasedUsername].filter(
    (checker): checker is RegistrabilityChecker | HostnameInDatasetChecker | UsernameInDatasetChecker =>
      checker !== undefined
  );

  try {
    await Promise.all(datasets.map(dataset => dataset.refresh()));
  } catch (error) {
    await cache?.close();
    throw error;
  }

  log.info('Email verifier ready', {
    registrability: resolved.registrability.enabled,
    disposable: resolved.disposable.enabled,
    free: resolved.free.enabled,
    roleBasedUsername: resolved.roleBasedUsername.enabled,
    mx: resolved.mx.enabled,
    avatar: resolved.avatar.enabled,
    smtp: resolved.smtp.enabled,
  });

  return new EmailVerifier(checkers, { cache });
}
