/**
 * Per-verifier options and their resolution into a complete configuration.
 *
 * Options override the environment defaults from ./env. Contradictory
 * combinations are rejected up front with every problem listed at once.
 */

import { Config, MxBackendKind, config as envConfig } from './env';

/**
 * Where a dataset's entries come from.
 * `bundled` names a list shipped under data/ (e.g. "psl", "disposable").
 */
export type DataSource =
  | { kind: 'remote'; url: string }
  | { kind: 'bundled'; name: string }
  | { kind: 'file'; path: string }
  | { kind: 'inline'; entries: readonly string[] };

export const REMOTE_SOURCES = {
  registrability: 'https://publicsuffix.org/list/public_suffix_list.dat',
  disposable: 'https://raw.githubusercontent.com/disposable/disposable-email-domains/master/domains_strict.txt',
  free: 'https://gist.githubusercontent.com/okutbay/5b4974b70673dfdcc21c517632c1f984/raw/daa988474b832059612f1b2468fba6cfcd2390dd/free_email_provider_domains.txt',
  roleBasedUsername: 'https://raw.githubusercontent.com/mbalatsko/role-based-email-addresses-list/main/list.txt',
} as const;

export const BUNDLED_SOURCES = {
  registrability: 'psl',
  disposable: 'disposable',
  free: 'free',
  roleBasedUsername: 'role-based',
} as const;

export interface SourceOptions {
  enabled?: boolean;
  /** Use the bundled list; cannot be combined with `source` */
  offline?: boolean;
  source?: DataSource;
}

export interface DatasetOptions extends SourceOptions {
  /** Entries that never match, whatever the base list says */
  allow?: readonly string[];
  /** Entries that always match */
  deny?: readonly string[];
}

export interface RegistrabilityOptions extends SourceOptions {
  /** Extra suffix rules, applied after the provider's rules */
  customRules?: readonly string[];
}

export interface MxOptions {
  enabled?: boolean;
  backend?: MxBackendKind;
  dohEndpoint?: string;
  cacheTtlMs?: number;
}

export interface AvatarOptions {
  enabled?: boolean;
  baseUrl?: string;
}

export interface ProxyOptions {
  host: string;
  port: number;
  type?: 4 | 5;
  userId?: string;
  password?: string;
}

export interface SmtpOptions {
  enabled?: boolean;
  catchAllCheck?: boolean;
  timeoutMs?: number;
  maxRetries?: number;
  port?: number;
  heloDomain?: string;
  mailFrom?: string;
  proxy?: ProxyOptions;
}

export interface VerifierOptions {
  /** Every dataset from bundled lists; MX, avatar and SMTP disabled */
  offline?: boolean;
  registrability?: RegistrabilityOptions;
  disposable?: DatasetOptions;
  free?: DatasetOptions;
  roleBasedUsername?: DatasetOptions;
  mx?: MxOptions;
  avatar?: AvatarOptions;
  smtp?: SmtpOptions;
}

export interface ResolvedDataset {
  enabled: boolean;
  source: DataSource;
  allow: readonly string[];
  deny: readonly string[];
}

export interface ResolvedRegistrability {
  enabled: boolean;
  source: DataSource;
  customRules: readonly string[];
}

export interface ResolvedMx {
  enabled: boolean;
  backend: MxBackendKind;
  dohEndpoint: string;
  cacheTtlMs: number;
}

export interface ResolvedAvatar {
  enabled: boolean;
  baseUrl: string;
}

export interface ResolvedSmtp {
  enabled: boolean;
  catchAllCheck: boolean;
  timeoutMs: number;
  maxRetries: number;
  port: number;
  heloDomain: string;
  mailFrom: string;
  proxy: ProxyOptions | null;
}

export interface VerifierConfig {
  registrability: ResolvedRegistrability;
  disposable: ResolvedDataset;
  free: ResolvedDataset;
  roleBasedUsername: ResolvedDataset;
  mx: ResolvedMx;
  avatar: ResolvedAvatar;
  smtp: ResolvedSmtp;
}

function isHttpUrl(value: string): boolean {
  try {
    const parsed = new URL(value);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
}

function isPort(value: number): boolean {
  return Number.isInteger(value) && value >= 1 && value <= 65535;
}

function resolveSource(
  name: string,
  options: SourceOptions,
  globalOffline: boolean,
  remoteDefault: DataSource,
  bundledName: string,
  errors: string[]
): DataSource {
  if (options.offline && options.source) {
    errors.push(`${name}: "offline" and "source" cannot be combined`);
  }

  if (globalOffline && options.source?.kind === 'remote') {
    errors.push(`${name}: remote source ${options.source.url} is not allowed in offline mode`);
  }

  if (options.source?.kind === 'remote' && !isHttpUrl(options.source.url)) {
    errors.push(`${name}: remote source must be an http(s) URL (got: "${options.source.url}")`);
  }

  if (options.source) {
    return options.source;
  }

  if (options.offline || globalOffline) {
    return { kind: 'bundled', name: bundledName };
  }

  return remoteDefault;
}

function resolveNetworkEnabled(
  name: string,
  enabled: boolean | undefined,
  defaultValue: boolean,
  globalOffline: boolean,
  errors: string[]
): boolean {
  if (globalOffline) {
    if (enabled === true) {
      errors.push(`${name}: cannot be enabled in offline mode`);
    }
    return false;
  }
  return enabled ?? defaultValue;
}

/**
 * Combine caller options with environment defaults.
 * @throws Error listing every conflicting or invalid option
 */
export function resolveConfig(options: VerifierOptions = {}, defaults: Config = envConfig): VerifierConfig {
  const errors: string[] = [];
  const offline = options.offline ?? defaults.offline;

  const registrabilityOptions = options.registrability ?? {};
  const registrability: ResolvedRegistrability = {
    enabled: registrabilityOptions.enabled ?? true,
    source: resolveSource(
      'registrability',
      registrabilityOptions,
      offline,
      { kind: 'remote', url: REMOTE_SOURCES.registrability },
      BUNDLED_SOURCES.registrability,
      errors
    ),
    customRules: registrabilityOptions.customRules ?? [],
  };

  const dataset = (
    name: 'disposable' | 'free' | 'roleBasedUsername',
    remoteDefault: DataSource
  ): ResolvedDataset => {
    const datasetOptions = options[name] ?? {};
    return {
      enabled: datasetOptions.enabled ?? true,
      source: resolveSource(name, datasetOptions, offline, remoteDefault, BUNDLED_SOURCES[name], errors),
      allow: datasetOptions.allow ?? [],
      deny: datasetOptions.deny ?? [],
    };
  };

  const disposable = dataset('disposable', { kind: 'remote', url: REMOTE_SOURCES.disposable });
  const free = dataset('free', { kind: 'remote', url: REMOTE_SOURCES.free });
  const roleBasedUsername = dataset('roleBasedUsername', { kind: 'remote', url: REMOTE_SOURCES.roleBasedUsername });

  const mxOptions = options.mx ?? {};
  const mx: ResolvedMx = {
    enabled: resolveNetworkEnabled('mx', mxOptions.enabled, true, offline, errors),
    backend: mxOptions.backend ?? defaults.mx.backend,
    dohEndpoint: mxOptions.dohEndpoint ?? defaults.mx.dohEndpoint,
    cacheTtlMs: mxOptions.cacheTtlMs ?? defaults.mx.cacheTtlMs,
  };

  if (!isHttpUrl(mx.dohEndpoint)) {
    errors.push(`mx: dohEndpoint must be an http(s) URL (got: "${mx.dohEndpoint}")`);
  }
  if (mx.cacheTtlMs < 0) {
    errors.push(`mx: cacheTtlMs must be >= 0 (got: ${mx.cacheTtlMs})`);
  }

  const avatarOptions = options.avatar ?? {};
  const avatar: ResolvedAvatar = {
    enabled: resolveNetworkEnabled('avatar', avatarOptions.enabled, true, offline, errors),
    baseUrl: avatarOptions.baseUrl ?? defaults.avatar.baseUrl,
  };

  if (!isHttpUrl(avatar.baseUrl)) {
    errors.push(`avatar: baseUrl must be an http(s) URL (got: "${avatar.baseUrl}")`);
  }

  const smtpOptions = options.smtp ?? {};
  const smtp: ResolvedSmtp = {
    enabled: resolveNetworkEnabled('smtp', smtpOptions.enabled, false, offline, errors),
    catchAllCheck: smtpOptions.catchAllCheck ?? true,
    timeoutMs: smtpOptions.timeoutMs ?? defaults.smtp.timeoutMs,
    maxRetries: smtpOptions.maxRetries ?? defaults.smtp.maxRetries,
    port: smtpOptions.port ?? defaults.smtp.port,
    heloDomain: smtpOptions.heloDomain ?? defaults.smtp.heloDomain,
    mailFrom: smtpOptions.mailFrom ?? defaults.smtp.mailFrom,
    proxy: smtpOptions.proxy ?? null,
  };

  if (smtp.maxRetries < 1) {
    errors.push(`smtp: maxRetries must be >= 1 (got: ${smtp.maxRetries})`);
  }
  if (smtp.timeoutMs <= 0) {
    errors.push(`smtp: timeoutMs must be > 0 (got: ${smtp.timeoutMs})`);
  }
  if (!isPort(smtp.port)) {
    errors.push(`smtp: port must be an integer between 1 and 65535 (got: ${smtp.port})`);
  }
  if (!smtp.heloDomain.includes('.')) {
    errors.push(`smtp: heloDomain must be a valid domain (got: "${smtp.heloDomain}")`);
  }
  if (!smtp.mailFrom.includes('@')) {
    errors.push(`smtp: mailFrom must be a valid email address (got: "${smtp.mailFrom}")`);
  }
  if (smtp.proxy && !isPort(smtp.proxy.port)) {
    errors.push(`smtp: proxy port must be an integer between 1 and 65535 (got: ${smtp.proxy.port})`);
  }

  if (errors.length > 0) {
    throw new Error(`Configuration validation failed:\n  - ${errors.join('\n  - ')}`);
  }

  return { registrability, disposable, free, roleBasedUsername, mx, avatar, smtp };
}
