/**
 * Tests for building a verifier from options
 */

import { createEmailVerifier } from '../src/services/verifierFactory';
import { SmtpResponse } from '../src/types/email';
import { ICache } from '../src/utils/cache';
import { ConnectionError } from '../src/utils/errors';
import { HttpClient, HttpResponse } from '../src/utils/http';
import { DnsLookupBackend } from '../src/validators/dnsValidator';
import { SmtpConnection, SmtpConnectionFactory } from '../src/validators/smtpConnection';

function unusedHttp(): HttpClient {
  return {
    get: jest.fn<Promise<HttpResponse>, Parameters<HttpClient['get']>>().mockRejectedValue(new Error('no network in tests')),
  };
}

function fakeCache(): ICache {
  return {
    get: jest.fn().mockResolvedValue(null),
    set: jest.fn().mockResolvedValue(undefined),
    delete: jest.fn().mockResolvedValue(undefined),
    close: jest.fn().mockResolvedValue(undefined),
  };
}

describe('createEmailVerifier', () => {
  describe('offline with bundled datasets', () => {
    it('should flag disposable domains and role usernames', async () => {
      const verifier = await createEmailVerifier({ offline: true }, { http: unusedHttp() });

      const result = await verifier.verify('info@mailinator.com');

      expect(result.syntax.status).toBe('passed');
      expect(result.registrability).toEqual({ status: 'passed', data: { registrableDomain: 'mailinator.com' } });
      expect(result.disposable).toEqual({
        status: 'failed',
        data: { match: true, matchedOn: 'mailinator.com', source: 'default' },
      });
      expect(result.free.status).toBe('passed');
      expect(result.roleBasedUsername).toEqual({
        status: 'failed',
        data: { match: true, matchedOn: 'info', source: 'default' },
      });
      expect(result.mx).toEqual({ status: 'skipped' });
      expect(result.avatar).toEqual({ status: 'skipped' });
      expect(result.smtp).toEqual({ status: 'skipped' });
      expect(result.isLikelyDeliverable()).toBe(false);

      await verifier.close();
    });

    it('should flag free providers and find registrable domains under multi-label suffixes', async () => {
      const verifier = await createEmailVerifier({ offline: true }, { http: unusedHttp() });

      const gmail = await verifier.verify('John.Doe@GMAIL.com');
      const corporate = await verifier.verify('jane@mail.example.co.uk');

      expect(gmail.free).toEqual({ status: 'failed', data: { match: true, matchedOn: 'gmail.com', source: 'default' } });
      expect(gmail.isLikelyDeliverable()).toBe(true);
      expect(corporate.registrability).toEqual({ status: 'passed', data: { registrableDomain: 'example.co.uk' } });
      expect(corporate.free.status).toBe('passed');
    });

    it.each([
      ['anna@example.gr', 'example.gr'],
      ['li@company.com.sg', 'company.com.sg'],
      ['bob@startup.ai', 'startup.ai'],
      ['jo@firma.hu', 'firma.hu'],
      ['sam@shop.co.jp', 'shop.co.jp'],
      ['kim@studio.design', 'studio.design'],
    ])('should find the registrable domain of %s', async (email, registrableDomain) => {
      const verifier = await createEmailVerifier({ offline: true }, { http: unusedHttp() });

      const result = await verifier.verify(email);

      expect(result.registrability).toEqual({ status: 'passed', data: { registrableDomain } });
      expect(result.isLikelyDeliverable()).toBe(true);
    });

    it('should apply allow lists over the bundled data', async () => {
      const verifier = await createEmailVerifier(
        { offline: true, free: { allow: ['gmail.com'] } },
        { http: unusedHttp() }
      );

      const result = await verifier.verify('john@gmail.com');

      expect(result.free).toEqual({ status: 'passed', data: { match: false, matchedOn: 'gmail.com', source: 'allow' } });
    });
  });

  it('should use injected DNS and SMTP collaborators', async () => {
    const dnsBackend: DnsLookupBackend = {
      getMxRecords: jest.fn().mockResolvedValue([{ exchange: 'mx1.example.com', priority: 10 }]),
    };
    const commands: string[] = [];
    const connection: SmtpConnection = {
      command: async (line: string): Promise<SmtpResponse> => {
        commands.push(line);
        return { code: 250, message: 'Ok' };
      },
      close: jest.fn(),
    };
    const smtpConnect = jest.fn<ReturnType<SmtpConnectionFactory>, Parameters<SmtpConnectionFactory>>()
      .mockResolvedValue(connection);

    const verifier = await createEmailVerifier(
      {
        registrability: { source: { kind: 'inline', entries: ['com'] } },
        disposable: { source: { kind: 'inline', entries: ['trash.test'] } },
        free: { source: { kind: 'inline', entries: ['freemail.test'] } },
        roleBasedUsername: { source: { kind: 'inline', entries: ['postmaster'] } },
        avatar: { enabled: false },
        smtp: { enabled: true, catchAllCheck: false },
      },
      { http: unusedHttp(), dnsBackend, smtpConnect }
    );

    const result = await verifier.verify('john@example.com');

    expect(result.mx).toEqual({ status: 'passed', data: { records: [{ exchange: 'mx1.example.com', priority: 10 }] } });
    expect(result.smtp).toEqual({
      status: 'passed',
      data: { deliverable: true, catchAll: null, code: 250, message: 'Ok' },
    });
    expect(smtpConnect.mock.calls[0][0]).toBe('mx1.example.com');
    expect(commands[2]).toBe('RCPT TO:<john@example.com>');
    expect(dnsBackend.getMxRecords).toHaveBeenCalledWith('example.com');
  });

  it('should fail and close the cache when a dataset cannot load', async () => {
    const http: HttpClient = {
      get: jest.fn<Promise<HttpResponse>, Parameters<HttpClient['get']>>().mockResolvedValue({
        status: 500,
        body: Buffer.from(''),
      }),
    };
    const cache = fakeCache();

    await expect(
      createEmailVerifier(
        {
          registrability: { offline: true },
          disposable: { offline: true },
          roleBasedUsername: { offline: true },
          free: { source: { kind: 'remote', url: 'https://lists.test/free.txt' } },
        },
        { http, cache }
      )
    ).rejects.toThrow(new ConnectionError('GET https://lists.test/free.txt returned HTTP 500'));

    expect(cache.close).toHaveBeenCalledTimes(1);
  });

  it('should reject invalid options', async () => {
    await expect(createEmailVerifier({ offline: true, smtp: { enabled: true } })).rejects.toThrow(
      'Configuration validation failed:\n  - smtp: cannot be enabled in offline mode'
    );
  });
});
