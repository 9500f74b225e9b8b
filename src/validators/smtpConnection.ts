/**
 * Line-oriented SMTP client connection over a raw TCP socket,
 * optionally tunnelled through a SOCKS4/5 proxy.
 *
 * Every failure here (connect, read timeout, closed socket, bad greeting)
 * is a TransportError so the prober can retry or move to the next host.
 */

import { Socket, connect } from 'net';
import { SocksClient } from 'socks';
import { ProxyOptions } from '../config/options';
import { SmtpResponse } from '../types/email';
import { TransportError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

const log = logger.child('smtp');

export interface SmtpConnectOptions {
  port: number;
  /** Connect timeout and per-reply read timeout */
  timeoutMs: number;
  proxy: ProxyOptions | null;
  /** Aborting closes the socket */
  signal?: AbortSignal;
}

export interface SmtpConnection {
  /** Send one command line and wait for its complete reply */
  command(line: string): Promise<SmtpResponse>;
  close(): void;
}

export type SmtpConnectionFactory = (host: string, options: SmtpConnectOptions) => Promise<SmtpConnection>;

const REPLY_LINE = /^(\d{3})([ -]?)(.*)$/;

interface PendingRead {
  resolve: (response: SmtpResponse) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * Assembles socket data into complete replies. Multi-line replies
 * ("250-first", "250 last") become one response with joined text.
 */
class ReplyReader {
  private buffer = '';
  private continuation: string[] = [];
  private readonly replies: SmtpResponse[] = [];
  private pending: PendingRead | null = null;
  private failure: Error | null = null;

  push(chunk: string): void {
    this.buffer += chunk;

    let newline = this.buffer.indexOf('\n');
    while (newline !== -1) {
      const line = this.buffer.slice(0, newline).replace(/\r$/, '');
      this.buffer = this.buffer.slice(newline + 1);
      this.onLine(line);
      newline = this.buffer.indexOf('\n');
    }
  }

  private onLine(line: string): void {
    if (line === '') return;

    const match = REPLY_LINE.exec(line);
    if (!match) {
      this.deliver({ code: 0, message: [...this.continuation, line].join('\n') });
      return;
    }

    if (match[2] === '-') {
      this.continuation.push(match[3]);
      return;
    }

    this.deliver({ code: parseInt(match[1], 10), message: [...this.continuation, match[3]].join('\n') });
  }

  private deliver(response: SmtpResponse): void {
    this.continuation = [];

    if (this.pending) {
      const { resolve, timer } = this.pending;
      clearTimeout(timer);
      this.pending = null;
      resolve(response);
      return;
    }

    this.replies.push(response);
  }

  fail(error: Error): void {
    if (this.failure) return;
    this.failure = error;

    if (this.pending) {
      const { reject, timer } = this.pending;
      clearTimeout(timer);
      this.pending = null;
      reject(error);
    }
  }

  next(timeoutMs: number): Promise<SmtpResponse> {
    const queued = this.replies.shift();
    if (queued) {
      return Promise.resolve(queued);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = null;
        reject(new TransportError(`No reply within ${timeoutMs}ms`));
      }, timeoutMs);
      this.pending = { resolve, reject, timer };
    });
  }
}

function connectDirect(host: string, port: number, timeoutMs: number): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const socket = connect({ host, port });

    const timer = setTimeout(() => {
      socket.destroy();
      reject(new TransportError(`Connection to ${host}:${port} timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    const onError = (error: Error) => {
      clearTimeout(timer);
      socket.destroy();
      reject(new TransportError(`Connection to ${host}:${port} failed: ${error.message}`, { cause: error }));
    };

    socket.once('error', onError);
    socket.once('connect', () => {
      clearTimeout(timer);
      socket.removeListener('error', onError);
      resolve(socket);
    });
  });
}

async function connectViaProxy(host: string, port: number, timeoutMs: number, proxy: ProxyOptions): Promise<Socket> {
  try {
    const { socket } = await SocksClient.createConnection({
      proxy: {
        host: proxy.host,
        port: proxy.port,
        type: proxy.type ?? 5,
        userId: proxy.userId,
        password: proxy.password,
      },
      command: 'connect',
      destination: { host, port },
      timeout: timeoutMs,
    });
    return socket;
  } catch (error) {
    throw new TransportError(
      `Connection to ${host}:${port} via proxy ${proxy.host}:${proxy.port} failed: ${errorMessage(error)}`,
      { cause: error }
    );
  }
}

export class SocketSmtpConnection implements SmtpConnection {
  private readonly reader = new ReplyReader();
  private readonly onAbort = () => this.close();

  private constructor(
    private readonly socket: Socket,
    private readonly host: string,
    private readonly timeoutMs: number,
    private readonly signal?: AbortSignal
  ) {
    // the decoder holds back a multi-byte character split across chunks
    socket.setEncoding('utf8');
    socket.on('data', (chunk: string) => this.reader.push(chunk));
    socket.on('error', (error: Error) => {
      this.reader.fail(new TransportError(`Socket error from ${host}: ${error.message}`, { cause: error }));
    });
    socket.on('close', () => {
      this.reader.fail(new TransportError(`Connection to ${host} closed`));
    });
    signal?.addEventListener('abort', this.onAbort, { once: true });
  }

  /**
   * Connect and read the greeting, which must be 220
   */
  static async open(host: string, options: SmtpConnectOptions): Promise<SocketSmtpConnection> {
    options.signal?.throwIfAborted();

    const socket = options.proxy
      ? await connectViaProxy(host, options.port, options.timeoutMs, options.proxy)
      : await connectDirect(host, options.port, options.timeoutMs);

    const connection = new SocketSmtpConnection(socket, host, options.timeoutMs, options.signal);

    try {
      if (options.signal?.aborted) {
        throw new TransportError(`Connection to ${host} aborted`);
      }
      const greeting = await connection.read();
      log.debug(`SMTP [${host}] <<< ${greeting.code} ${greeting.message}`);
      if (greeting.code !== 220) {
        throw new TransportError(`Unexpected greeting from ${host}: ${greeting.code} ${greeting.message}`);
      }
    } catch (error) {
      connection.close();
      throw error;
    }

    return connection;
  }

  private read(): Promise<SmtpResponse> {
    return this.reader.next(this.timeoutMs);
  }

  async command(line: string): Promise<SmtpResponse> {
    if (this.socket.destroyed) {
      throw new TransportError(`Connection to ${this.host} is closed`);
    }

    log.debug(`SMTP [${this.host}] >>> ${line}`);
    this.socket.write(`${line}\r\n`);

    const response = await this.read();
    log.debug(`SMTP [${this.host}] <<< ${response.code} ${response.message}`);
    return response;
  }

  close(): void {
    this.signal?.removeEventListener('abort', this.onAbort);
    this.reader.fail(new TransportError(`Connection to ${this.host} closed`));
    this.socket.destroy();
  }
}

export const openSocketConnection: SmtpConnectionFactory = (host, options) => SocketSmtpConnection.open(host, options);
