/**
 * Tests for the verification orchestrator
 * Every checker is a fake so no network is touched
 */

import { EmailVerifier, VerifierCheckers, hashEmailForLogging } from '../src/services/emailValidationService';
import { AddressParts, AvatarData, DatasetData, MxData, RegistrabilityData, SmtpData } from '../src/types/email';
import { ICache } from '../src/utils/cache';
import { ConnectionError, RefreshError } from '../src/utils/errors';
import { metrics } from '../src/utils/metrics';
import { SmtpContext } from '../src/validators/smtpValidator';

const NO_MATCH: DatasetData = { match: false, matchedOn: null, source: null };
const MX: MxData = { records: [{ exchange: 'mx1.example.com', priority: 10 }] };
const DELIVERABLE: SmtpData = { deliverable: true, catchAll: false, code: 250, message: 'Ok' };

function fakeChecker<T>(data: T) {
  return { check: jest.fn<Promise<T>, [AddressParts, void]>().mockResolvedValue(data) };
}

function fakeSmtp(data: SmtpData = DELIVERABLE) {
  return { check: jest.fn<Promise<SmtpData>, [AddressParts, SmtpContext]>().mockResolvedValue(data) };
}

function allCheckers() {
  return {
    registrability: fakeChecker<RegistrabilityData>({ registrableDomain: 'example.com' }),
    mx: fakeChecker<MxData>(MX),
    disposable: fakeChecker<DatasetData>(NO_MATCH),
    avatar: fakeChecker<AvatarData>({ avatarUrl: 'https://avatars.test/avatar/abc' }),
    free: fakeChecker<DatasetData>(NO_MATCH),
    roleBasedUsername: fakeChecker<DatasetData>(NO_MATCH),
    smtp: fakeSmtp(),
  };
}

describe('hashEmailForLogging', () => {
  it('should return the same 8-character hash regardless of case', () => {
    const hash = hashEmailForLogging('John@Example.com');

    expect(hash).toHaveLength(8);
    expect(hash).toBe(hashEmailForLogging('john@example.com'));
  });
});

describe('EmailVerifier', () => {
  beforeEach(() => {
    metrics.reset();
  });

  describe('verify', () => {
    it('should pass every check for a good address', async () => {
      const checkers = allCheckers();
      const verifier = new EmailVerifier(checkers);

      const result = await verifier.verify('john+news@example.com');

      expect(result.parts).toEqual({ username: 'john', plusTag: 'news', hostname: 'example.com' });
      expect(result.syntax).toEqual({ status: 'passed', data: { username: true, plusTag: true, hostname: true } });
      expect(result.registrability).toEqual({ status: 'passed', data: { registrableDomain: 'example.com' } });
      expect(result.mx).toEqual({ status: 'passed', data: MX });
      expect(result.disposable).toEqual({ status: 'passed', data: NO_MATCH });
      expect(result.avatar).toEqual({ status: 'passed', data: { avatarUrl: 'https://avatars.test/avatar/abc' } });
      expect(result.free).toEqual({ status: 'passed', data: NO_MATCH });
      expect(result.roleBasedUsername).toEqual({ status: 'passed', data: NO_MATCH });
      expect(result.smtp).toEqual({ status: 'passed', data: DELIVERABLE });
      expect(result.isLikelyDeliverable()).toBe(true);

      expect(checkers.smtp.check).toHaveBeenCalledWith(result.parts, { records: MX.records, signal: undefined });
    });

    it('should return results that callers cannot change', async () => {
      const checkers = allCheckers();
      const verifier = new EmailVerifier(checkers);

      const result = await verifier.verify('john@example.com');
      const { mx, syntax } = result;
      if (mx.status !== 'passed' || syntax.status !== 'passed') {
        throw new Error(`unexpected statuses ${mx.status}/${syntax.status}`);
      }

      expect(Reflect.set(result, 'mx', { status: 'skipped' })).toBe(false);
      expect(Reflect.set(mx.data.records, 'length', 0)).toBe(false);
      expect(Reflect.set(syntax.data, 'hostname', false)).toBe(false);
      expect(result.mx).toEqual({ status: 'passed', data: MX });
      expect(result.syntax).toEqual({ status: 'passed', data: { username: true, plusTag: true, hostname: true } });

      // SMTP probes the same frozen records the result reports
      const [, context] = checkers.smtp.check.mock.calls[0];
      expect(Object.isFrozen(context.records)).toBe(true);
      expect(Object.isFrozen(MX.records)).toBe(false);
    });

    it('should fail syntax and skip everything else for an unparsable address', async () => {
      const checkers = allCheckers();
      const verifier = new EmailVerifier(checkers);

      const result = await verifier.verify('bad@@example.com');

      expect(result.parts).toBeNull();
      expect(result.syntax).toEqual({ status: 'failed', data: { username: false, plusTag: false, hostname: false } });
      for (const check of [result.registrability, result.mx, result.disposable, result.avatar, result.free, result.roleBasedUsername, result.smtp]) {
        expect(check).toEqual({ status: 'skipped' });
      }
      expect(result.isLikelyDeliverable()).toBe(false);
      expect(checkers.registrability.check).not.toHaveBeenCalled();
      expect(checkers.roleBasedUsername.check).not.toHaveBeenCalled();
    });

    it('should only run username checks when the hostname is invalid', async () => {
      const checkers = allCheckers();
      const verifier = new EmailVerifier(checkers);

      const result = await verifier.verify('admin@');

      expect(result.syntax).toEqual({ status: 'failed', data: { username: true, plusTag: true, hostname: false } });
      expect(result.registrability.status).toBe('skipped');
      expect(result.mx.status).toBe('skipped');
      expect(result.avatar.status).toBe('skipped');
      expect(result.smtp.status).toBe('skipped');
      expect(result.roleBasedUsername.status).toBe('passed');
      expect(checkers.roleBasedUsername.check).toHaveBeenCalledWith({ username: 'admin', plusTag: '', hostname: '' });
    });

    it('should skip disabled checks', async () => {
      const verifier = new EmailVerifier({});

      const result = await verifier.verify('john@example.com');

      expect(result.syntax.status).toBe('passed');
      expect(result.registrability).toEqual({ status: 'skipped' });
      expect(result.mx).toEqual({ status: 'skipped' });
      expect(result.smtp).toEqual({ status: 'skipped' });
      expect(result.isLikelyDeliverable()).toBe(true);
    });

    it('should record a collaborator failure as errored on that check only', async () => {
      const checkers = allCheckers();
      checkers.mx.check.mockRejectedValue(new ConnectionError('DNS lookup failed'));
      const verifier = new EmailVerifier(checkers);

      const result = await verifier.verify('john@example.com');

      expect(result.mx.status).toBe('errored');
      expect(result.mx.status === 'errored' && result.mx.error.message).toBe('DNS lookup failed');
      expect(result.smtp).toEqual({ status: 'skipped' });
      expect(result.disposable.status).toBe('passed');
      expect(result.isLikelyDeliverable()).toBe(true);
      expect(checkers.smtp.check).not.toHaveBeenCalled();
    });

    it('should fail MX and skip SMTP when there are no records', async () => {
      const checkers = allCheckers();
      checkers.mx.check.mockResolvedValue({ records: [] });
      const verifier = new EmailVerifier(checkers);

      const result = await verifier.verify('john@example.com');

      expect(result.mx).toEqual({ status: 'failed', data: { records: [] } });
      expect(result.smtp).toEqual({ status: 'skipped' });
      expect(result.isLikelyDeliverable()).toBe(false);
    });

    it('should not be likely deliverable when the hostname is not registrable', async () => {
      const checkers = allCheckers();
      checkers.registrability.check.mockResolvedValue({ registrableDomain: null });
      const verifier = new EmailVerifier(checkers);

      const result = await verifier.verify('john@com');

      expect(result.registrability).toEqual({ status: 'failed', data: { registrableDomain: null } });
      expect(result.isLikelyDeliverable()).toBe(false);
    });

    it('should fail dataset checks on a match without affecting deliverability', async () => {
      const checkers = allCheckers();
      const match: DatasetData = { match: true, matchedOn: 'example.com', source: 'default' };
      checkers.free.check.mockResolvedValue(match);
      const verifier = new EmailVerifier(checkers);

      const result = await verifier.verify('john@example.com');

      expect(result.free).toEqual({ status: 'failed', data: match });
      expect(result.isLikelyDeliverable()).toBe(true);
    });

    it('should fail SMTP for a rejected mailbox', async () => {
      const checkers = allCheckers();
      const rejected: SmtpData = { deliverable: false, catchAll: null, code: 550, message: 'No such user' };
      checkers.smtp.check.mockResolvedValue(rejected);
      const verifier = new EmailVerifier(checkers);

      const result = await verifier.verify('john@example.com');

      expect(result.smtp).toEqual({ status: 'failed', data: rejected });
    });

    it('should pass the abort signal to SMTP and report the abort as errored', async () => {
      const checkers = allCheckers();
      checkers.smtp.check.mockImplementation(async (_parts, context) => {
        context.signal?.throwIfAborted();
        return DELIVERABLE;
      });
      const controller = new AbortController();
      controller.abort();
      const verifier = new EmailVerifier(checkers);

      const result = await verifier.verify('john@example.com', { signal: controller.signal });

      expect(result.smtp.status).toBe('errored');
      expect(result.smtp.status === 'errored' && result.smtp.error.name).toBe('AbortError');
      expect(result.mx.status).toBe('passed');
    });

    it('should record metrics for each verification', async () => {
      const verifier = new EmailVerifier(allCheckers());

      await verifier.verify('john@example.com');
      await verifier.verify('not-an-address');

      const counts = metrics.getMetrics();
      expect(counts.totalVerifications).toBe(2);
      expect(counts.unparsableAddresses).toBe(1);
      expect(counts.checks.syntax).toEqual({ passed: 1, failed: 1, skipped: 0, errored: 0 });
      expect(counts.checks.smtp).toEqual({ passed: 1, failed: 0, skipped: 1, errored: 0 });
    });
  });

  describe('verifyBatch', () => {
    it('should return results in input order', async () => {
      const verifier = new EmailVerifier(allCheckers());
      const emails = ['a@example.com', 'not-an-address', 'b@example.com', 'c@example.com'];

      const results = await verifier.verifyBatch(emails, 2);

      expect(results.map(result => result.email)).toEqual(emails);
      expect(results.map(result => result.syntax.status)).toEqual(['passed', 'failed', 'passed', 'passed']);
    });

    it('should reject a non-positive concurrency', async () => {
      const verifier = new EmailVerifier({});

      await expect(verifier.verifyBatch(['a@example.com'], 0)).rejects.toThrow(RangeError);
    });
  });

  describe('refresh', () => {
    it('should refresh every dataset and report failures together', async () => {
      const disposable = { ...fakeChecker<DatasetData>(NO_MATCH), refresh: jest.fn().mockResolvedValue(undefined) };
      const free = {
        ...fakeChecker<DatasetData>(NO_MATCH),
        refresh: jest.fn().mockRejectedValue(new ConnectionError('GET https://lists.test/free.txt returned HTTP 500')),
      };
      const checkers: VerifierCheckers = { disposable, free };
      const verifier = new EmailVerifier(checkers);

      const error = await verifier.refresh().then(
        () => null,
        (reason: unknown) => reason
      );

      expect(error).toBeInstanceOf(RefreshError);
      expect(error instanceof RefreshError && error.errors.map(e => e.message)).toEqual([
        'GET https://lists.test/free.txt returned HTTP 500',
      ]);
      expect(disposable.refresh).toHaveBeenCalledTimes(1);
      expect(free.refresh).toHaveBeenCalledTimes(1);
    });

    it('should resolve when every dataset reloads', async () => {
      const roleBasedUsername = { ...fakeChecker<DatasetData>(NO_MATCH), refresh: jest.fn().mockResolvedValue(undefined) };
      const verifier = new EmailVerifier({ roleBasedUsername });

      await expect(verifier.refresh()).resolves.toBeUndefined();
    });
  });

  describe('close', () => {
    it('should close the cache', async () => {
      const cache: ICache = {
        get: jest.fn().mockResolvedValue(null),
        set: jest.fn().mockResolvedValue(undefined),
        delete: jest.fn().mockResolvedValue(undefined),
        close: jest.fn().mockResolvedValue(undefined),
      };
      const verifier = new EmailVerifier({}, { cache });

      await verifier.close();

      expect(cache.close).toHaveBeenCalledTimes(1);
    });
  });

  describe('toJSON', () => {
    it('should serialize statuses, data and errors', async () => {
      const checkers = allCheckers();
      checkers.avatar.check.mockRejectedValue(new ConnectionError('Avatar lookup returned HTTP 503'));
      const verifier = new EmailVerifier({ mx: checkers.mx, avatar: checkers.avatar });

      const json = (await verifier.verify('john@example.com')).toJSON();

      expect(json.email).toBe('john@example.com');
      expect(json.parts).toEqual({ username: 'john', plusTag: '', hostname: 'example.com' });
      expect(json.likelyDeliverable).toBe(true);
      expect(json.checks.mx).toEqual({ status: 'passed', data: MX });
      expect(json.checks.avatar).toEqual({
        status: 'errored',
        error: { name: 'ConnectionError', message: 'Avatar lookup returned HTTP 503' },
      });
      expect(json.checks.free).toEqual({ status: 'skipped' });
      expect(JSON.parse(JSON.stringify(json)).checks.syntax).toEqual({
        status: 'passed',
        data: { username: true, plusTag: true, hostname: true },
      });
    });
  });
});
