/**
 * Email verification orchestration.
 * Runs every enabled check for an address, honouring the dependencies
 * between them, and folds the outcomes into one EmailValidationResult.
 */

import { createHash } from 'crypto';
import { CheckResult, CheckStatus, errored, failed, passed, skipped } from '../types/checkResult';
import {
  AddressParts,
  AvatarData,
  DatasetData,
  MxData,
  RegistrabilityData,
  SmtpData,
} from '../types/email';
import { CheckName, CheckResults, EmailValidationResult } from '../types/validationResult';
import { ICache } from '../utils/cache';
import { FormatError, RefreshError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { metrics } from '../utils/metrics';
import { parseAddress } from '../validators/addressParser';
import { Checker, Refreshable, isRefreshable } from '../validators/checker';
import { SmtpContext } from '../validators/smtpValidator';
import { isSyntaxValid, validateSyntax } from '../validators/syntaxValidator';

const log = logger.child('verifier');

/**
 * Hash email for privacy-safe logging (PII protection)
 * Returns first 8 chars of SHA256 hash for log correlation
 */
export function hashEmailForLogging(email: string): string {
  return createHash('sha256').update(email.toLowerCase()).digest('hex').substring(0, 8);
}

/**
 * The checkers a verifier runs. An absent checker is disabled and its
 * field is always `skipped`.
 */
export interface VerifierCheckers {
  registrability?: Checker<RegistrabilityData>;
  mx?: Checker<MxData>;
  disposable?: Checker<DatasetData>;
  avatar?: Checker<AvatarData>;
  free?: Checker<DatasetData>;
  roleBasedUsername?: Checker<DatasetData>;
  smtp?: Checker<SmtpData, SmtpContext>;
}

export interface VerifyOptions {
  /** Aborting closes any open SMTP connection; the SMTP check then errors */
  signal?: AbortSignal;
}

export interface EmailVerifierOptions {
  /** Closed together with the verifier */
  cache?: ICache;
}

/**
 * Success predicate per check. The data is attached whichever way it goes.
 */
const SUCCESS = {
  registrability: (data: RegistrabilityData) => data.registrableDomain !== null,
  mx: (data: MxData) => data.records.length > 0,
  disposable: (data: DatasetData) => !data.match,
  avatar: (data: AvatarData) => data.avatarUrl !== null,
  free: (data: DatasetData) => !data.match,
  roleBasedUsername: (data: DatasetData) => !data.match,
  smtp: (data: SmtpData) => data.deliverable,
};

export class EmailVerifier {
  private readonly cache?: ICache;

  constructor(
    private readonly checkers: VerifierCheckers,
    options: EmailVerifierOptions = {}
  ) {
    this.cache = options.cache;
  }

  /**
   * Verify an email address through every enabled check.
   *
   * Never throws for a bad address: unparsable input fails the syntax
   * check and skips everything else. Collaborator failures become
   * `errored` on the affected check only.
   */
  async verify(email: string, options: VerifyOptions = {}): Promise<EmailValidationResult> {
    const startTime = Date.now();
    const emailHash = hashEmailForLogging(email);

    log.info('Starting verification', { emailHash });

    let parts: AddressParts;
    try {
      parts = parseAddress(email);
    } catch (error) {
      if (!(error instanceof FormatError)) {
        throw error;
      }
      log.info(`Verification failed: ${error.message}`, { emailHash });
      metrics.incrementUnparsable();
      return this.finish(email, null, unparsableChecks(), startTime, emailHash);
    }

    const syntaxData = validateSyntax(parts);
    const syntax = isSyntaxValid(syntaxData) ? passed(syntaxData) : failed(syntaxData);
    const hostnameValid = syntaxData.hostname;
    const usernameValid = syntaxData.username;

    log.debug('Syntax checked', { emailHash, ...syntaxData });

    const run = <T>(
      name: CheckName,
      checker: Checker<T> | undefined,
      eligible: boolean,
      isSuccess: (data: T) => boolean
    ): Promise<CheckResult<T>> => {
      if (!checker || !eligible) {
        return Promise.resolve(skipped());
      }
      return this.execute(name, emailHash, () => checker.check(parts), isSuccess);
    };

    const registrability = run('registrability', this.checkers.registrability, hostnameValid, SUCCESS.registrability);
    const mx = run('mx', this.checkers.mx, hostnameValid, SUCCESS.mx);
    const disposable = run('disposable', this.checkers.disposable, hostnameValid, SUCCESS.disposable);
    const free = run('free', this.checkers.free, hostnameValid, SUCCESS.free);
    const roleBasedUsername = run('roleBasedUsername', this.checkers.roleBasedUsername, usernameValid, SUCCESS.roleBasedUsername);
    const avatar = run('avatar', this.checkers.avatar, usernameValid && hostnameValid, SUCCESS.avatar);

    // SMTP is the only check that waits for another one
    const smtpChecker = this.checkers.smtp;
    const smtp = mx.then((mxResult): Promise<CheckResult<SmtpData>> => {
      if (!smtpChecker || !usernameValid || !hostnameValid || mxResult.status !== 'passed') {
        return Promise.resolve(skipped());
      }
      const context: SmtpContext = { records: mxResult.data.records, signal: options.signal };
      return this.execute('smtp', emailHash, () => smtpChecker.check(parts, context), SUCCESS.smtp);
    });

    const [registrabilityResult, mxResult, disposableResult, avatarResult, freeResult, roleResult, smtpResult] =
      await Promise.all([registrability, mx, disposable, avatar, free, roleBasedUsername, smtp]);

    const checks: CheckResults = {
      syntax,
      registrability: registrabilityResult,
      mx: mxResult,
      disposable: disposableResult,
      avatar: avatarResult,
      free: freeResult,
      roleBasedUsername: roleResult,
      smtp: smtpResult,
    };

    return this.finish(email, parts, checks, startTime, emailHash);
  }

  /**
   * Verify many addresses, at most `concurrency` at a time.
   * Results are in input order.
   */
  async verifyBatch(
    emails: string[],
    concurrency: number = 20,
    options: VerifyOptions = {}
  ): Promise<EmailValidationResult[]> {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer (got: ${concurrency})`);
    }

    log.info(`Starting batch verification for ${emails.length} emails`);

    const results: EmailValidationResult[] = [];

    for (let i = 0; i < emails.length; i += concurrency) {
      const chunk = emails.slice(i, i + concurrency);
      const chunkResults = await Promise.all(chunk.map(email => this.verify(email, options)));
      results.push(...chunkResults);

      log.debug(`Batch progress: ${results.length}/${emails.length} emails verified`);
    }

    log.info(`Batch verification complete: ${results.length} emails processed`);

    return results;
  }

  /**
   * Reload every dataset-backed checker concurrently. Datasets that
   * reload successfully are swapped in even if others fail.
   * @throws RefreshError listing the failures
   */
  async refresh(): Promise<void> {
    const refreshables = this.refreshables();
    const outcomes = await Promise.allSettled(refreshables.map(checker => checker.refresh()));

    const errors: Error[] = [];
    for (const outcome of outcomes) {
      if (outcome.status === 'rejected') {
        const error = outcome.reason instanceof Error ? outcome.reason : new Error(String(outcome.reason));
        log.error('Dataset refresh failed, keeping previous data', error);
        errors.push(error);
      }
    }

    if (errors.length > 0) {
      throw new RefreshError(errors);
    }

    log.info(`Refreshed ${refreshables.length} dataset(s)`);
  }

  /**
   * Release the MX cache connection, if any
   */
  async close(): Promise<void> {
    await this.cache?.close();
  }

  private refreshables(): Refreshable[] {
    const refreshables: Refreshable[] = [];
    const { registrability, disposable, free, roleBasedUsername } = this.checkers;

    for (const checker of [registrability, disposable, free, roleBasedUsername]) {
      if (checker && isRefreshable(checker)) {
        refreshables.push(checker);
      }
    }

    return refreshables;
  }

  private async execute<T>(
    name: CheckName,
    emailHash: string,
    call: () => Promise<T>,
    isSuccess: (data: T) => boolean
  ): Promise<CheckResult<T>> {
    try {
      const data = await call();
      return isSuccess(data) ? passed(data) : failed(data);
    } catch (error) {
      log.warn(`${name} check errored`, { emailHash, error: errorMessage(error) });
      return errored(error);
    }
  }

  private finish(
    email: string,
    parts: AddressParts | null,
    checks: CheckResults,
    startTime: number,
    emailHash: string
  ): EmailValidationResult {
    const result = new EmailValidationResult(email, parts, checks, Date.now() - startTime);

    metrics.incrementVerifications();
    const statuses: Partial<Record<CheckName, CheckStatus>> = {};
    for (const [name, check] of entries(checks)) {
      metrics.recordCheck(name, check.status);
      statuses[name] = check.status;
    }

    log.info('Verification complete', {
      emailHash,
      likelyDeliverable: result.isLikelyDeliverable(),
      ...statuses,
      timeMs: result.validationTimeMs,
    });

    return result;
  }
}

function unparsableChecks(): CheckResults {
  return {
    syntax: failed({ username: false, plusTag: false, hostname: false }),
    registrability: skipped(),
    mx: skipped(),
    disposable: skipped(),
    avatar: skipped(),
    free: skipped(),
    roleBasedUsername: skipped(),
    smtp: skipped(),
  };
}

function entries(checks: CheckResults): Array<[CheckName, CheckResult<unknown>]> {
  return [
    ['syntax', checks.syntax],
    ['registrability', checks.registrability],
    ['mx', checks.mx],
    ['disposable', checks.disposable],
    ['avatar', checks.avatar],
    ['free', checks.free],
    ['roleBasedUsername', checks.roleBasedUsername],
    ['smtp', checks.smtp],
  ];
}
