/**
 * SMTP mailbox probe.
 *
 * Connects to the domain's mail exchangers in preference order and asks
 * whether the recipient would be accepted (HELO, MAIL FROM, RCPT TO),
 * then optionally probes a random recipient to detect catch-all servers.
 * No message is ever sent.
 *
 * WARNING: Performs real network connections. Many networks block
 * outbound port 25; use a proxy where that applies.
 */

import { randomBytes } from 'crypto';
import { ProxyOptions } from '../config/options';
import { AddressParts, MxRecord, SmtpData } from '../types/email';
import { ConnectionError, TransportError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { Checker } from './checker';
import { SmtpConnection, SmtpConnectionFactory, openSocketConnection } from './smtpConnection';

const log = logger.child('smtp');

export interface SmtpContext {
  /** Mail exchangers to try, in order */
  records: readonly MxRecord[];
  signal?: AbortSignal;
}

export interface SmtpCheckerOptions {
  port: number;
  timeoutMs: number;
  /** Attempts per mail exchanger */
  maxRetries: number;
  heloDomain: string;
  mailFrom: string;
  catchAllCheck: boolean;
  proxy: ProxyOptions | null;
  connect?: SmtpConnectionFactory;
  randomLocalPart?: () => string;
}

function isPositive(code: number): boolean {
  return code >= 200 && code < 300;
}

/**
 * Reply to a made-up recipient: accepted means catch-all, permanent
 * rejection means not, anything else says nothing.
 */
export function classifyCatchAll(code: number): boolean | null {
  if (isPositive(code)) return true;
  if (code >= 500 && code < 600) return false;
  return null;
}

export function randomCatchAllLocalPart(): string {
  return `${randomBytes(4).toString('hex')}catchalltest${randomBytes(4).toString('hex')}`;
}

export class SmtpChecker implements Checker<SmtpData, SmtpContext> {
  private readonly connect: SmtpConnectionFactory;
  private readonly randomLocalPart: () => string;

  constructor(private readonly options: SmtpCheckerOptions) {
    this.connect = options.connect ?? openSocketConnection;
    this.randomLocalPart = options.randomLocalPart ?? randomCatchAllLocalPart;
  }

  /**
   * @throws ConnectionError when no mail exchanger could be reached
   */
  async check(parts: AddressParts, context: SmtpContext): Promise<SmtpData> {
    const { records, signal } = context;

    if (records.length === 0) {
      return { deliverable: false, catchAll: null, code: 0, message: '' };
    }

    let lastError: unknown = null;

    for (const record of records) {
      for (let attempt = 1; attempt <= this.options.maxRetries; attempt++) {
        signal?.throwIfAborted();

        try {
          const result = await this.probe(record.exchange, parts, signal);
          log.info(`SMTP probe complete for ${parts.hostname}`, {
            mx: record.exchange,
            code: result.code,
            catchAll: result.catchAll,
          });
          return result;
        } catch (error) {
          signal?.throwIfAborted();
          if (!(error instanceof TransportError)) {
            throw error;
          }
          lastError = error;
          log.warn(`SMTP attempt ${attempt}/${this.options.maxRetries} on ${record.exchange} failed`, {
            error: error.message,
          });
        }
      }
    }

    throw new ConnectionError(
      `Could not reach any of ${records.length} mail exchanger(s) for ${parts.hostname}: ${errorMessage(lastError)}`,
      { cause: lastError }
    );
  }

  private async probe(host: string, parts: AddressParts, signal?: AbortSignal): Promise<SmtpData> {
    const connection = await this.connect(host, {
      port: this.options.port,
      timeoutMs: this.options.timeoutMs,
      proxy: this.options.proxy,
      signal,
    });

    try {
      await connection.command(`HELO ${this.options.heloDomain}`);
      await connection.command(`MAIL FROM:<${this.options.mailFrom}>`);
      const recipient = await connection.command(`RCPT TO:<${parts.username}@${parts.hostname}>`);

      let catchAll: boolean | null = null;
      if (this.options.catchAllCheck) {
        const probe = await connection.command(`RCPT TO:<${this.randomLocalPart()}@${parts.hostname}>`);
        catchAll = classifyCatchAll(probe.code);
      }

      await this.quit(connection, host);

      return {
        deliverable: isPositive(recipient.code),
        catchAll,
        code: recipient.code,
        message: recipient.message,
      };
    } finally {
      connection.close();
    }
  }

  private async quit(connection: SmtpConnection, host: string): Promise<void> {
    try {
      await connection.command('QUIT');
    } catch (error) {
      // the answer is already known, a failed goodbye does not change it
      log.debug(`QUIT on ${host} failed`, { error: errorMessage(error) });
    }
  }
}
