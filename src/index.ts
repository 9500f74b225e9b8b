export { createEmailVerifier, VerifierDependencies } from './services/verifierFactory';
export {
  EmailVerifier,
  VerifierCheckers,
  VerifyOptions,
  hashEmailForLogging,
} from './services/emailValidationService';
export {
  DataSource,
  VerifierOptions,
  VerifierConfig,
  ProxyOptions,
  resolveConfig,
} from './config/options';
export { config, loadConfig } from './config/env';
export * from './types/checkResult';
export * from './types/email';
export * from './types/validationResult';
export { FormatError, ConnectionError, TransportError, RefreshError } from './utils/errors';
export { HttpClient, HttpResponse, FetchHttpClient } from './utils/http';
export { ICache, InMemoryCache, RedisCache, createCache } from './utils/cache';
export { logger, Logger, LogLevel } from './utils/logger';
export { metrics } from './utils/metrics';
export {
  DomainsProvider,
  RemoteListProvider,
  FileListProvider,
  BundledListProvider,
  StaticListProvider,
  parseLineList,
} from './providers/domainsProvider';
export { parseAddress } from './validators/addressParser';
export { validateSyntax, isUsernameValid, isPlusTagValid, isHostnameValid } from './validators/syntaxValidator';
export { Checker, Refreshable } from './validators/checker';
export { SuffixTrie, RegistrabilityChecker } from './validators/registrabilityValidator';
export { HostnameInDatasetChecker, UsernameInDatasetChecker } from './validators/datasetValidator';
export {
  DnsLookupBackend,
  DohLookupBackend,
  NativeDnsLookupBackend,
  CachedDnsLookupBackend,
  MxRecordChecker,
} from './validators/dnsValidator';
export { SmtpChecker, SmtpContext } from './validators/smtpValidator';
export { SmtpConnection, SmtpConnectionFactory, SocketSmtpConnection } from './validators/smtpConnection';
export { AvatarChecker } from './validators/avatarValidator';
