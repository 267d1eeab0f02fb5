import { AlertDispatcher } from '../security-alerts/alert-dispatcher.service';
import {
  CHROME_UA,
  DAY_MS,
  FakeAccessTokenIssuer,
  FakeClock,
  FakeCustomerDirectory,
  FIREFOX_UA,
  HOUR_MS,
  RecordingAlertSink,
  T0,
  testConfig,
} from '../testing/fakes';
import { InMemoryTokenStore } from './in-memory-token.store';
import type { RefreshTokenRecord } from './refresh-token.record';
import {
  ConcurrentRotationError,
  RefreshTokenExpiredError,
  RefreshTokenNotFoundError,
  RefreshTokenReplayError,
} from './refresh-token.errors';
import { ReplayDetector, type RequestOrigin } from './replay-detector.service';
import { TokenRotationService } from './token-rotation.service';

/** Holds every lookup until two are pending, so both callers read the row before either claims it. */
class GatedTokenStore extends InMemoryTokenStore {
  private waiting: (() => void)[] = [];

  override async findByValue(value: string): Promise<RefreshTokenRecord | null> {
    const found = await super.findByValue(value);
    await new Promise<void>((resolve) => {
      this.waiting.push(resolve);
      if (this.waiting.length === 2) this.waiting.forEach((release) => release());
    });
    return found;
  }
}

const home: RequestOrigin = { ip: '10.0.0.1', userAgent: CHROME_UA };
const elsewhere: RequestOrigin = { ip: '203.0.113.9', userAgent: FIREFOX_UA };

describe('TokenRotationService', () => {
  let store: InMemoryTokenStore;
  let clock: FakeClock;
  let customers: FakeCustomerDirectory;
  let sink: RecordingAlertSink;
  let dispatcher: AlertDispatcher;
  let issuer: FakeAccessTokenIssuer;
  let service: TokenRotationService;

  function build(tokenStore: InMemoryTokenStore) {
    const config = testConfig();
    store = tokenStore;
    dispatcher = new AlertDispatcher(config);
    issuer = new FakeAccessTokenIssuer();
    service = new TokenRotationService(
      store,
      issuer,
      customers,
      sink,
      new ReplayDetector(store, sink, dispatcher, clock),
      dispatcher,
      config,
      clock,
    );
  }

  beforeEach(() => {
    clock = new FakeClock();
    customers = new FakeCustomerDirectory();
    customers.add({ name: 'Ada', email: 'ada@example.test', roles: ['ROLE_USER'], password: 'password1' });
    sink = new RecordingAlertSink();
    build(new InMemoryTokenStore());
  });

  const activeCount = async (customerRef: string) => (await store.findActiveForCustomer(customerRef, clock.now())).length;

  async function login(origin: RequestOrigin = home) {
    const profile = await customers.findProfile('1');
    if (!profile) throw new Error('fixture customer missing');
    return service.startSession(profile, origin);
  }

  describe('startSession', () => {
    it('issues an access token and a refresh token valid for the configured lifetime', async () => {
      const session = await login();

      expect(session.accessToken).toBe('access-1-ROLE_USER-1');
      expect(session.expiresIn).toBe(900);
      expect(session.refreshToken).toMatchObject({
        customerRef: '1',
        issuedAt: T0,
        expiresAt: new Date(T0.getTime() + 7 * DAY_MS),
        revoked: false,
        ipAddress: '10.0.0.1',
        userAgent: CHROME_UA,
        deviceInfo: 'Windows 10 - Chrome - Desktop',
      });
    });
  });

  describe('refreshAccessToken', () => {
    it('rotates into a successor with a fresh expiry and spends the parent', async () => {
      const { refreshToken } = await login();
      clock.advance(HOUR_MS);

      const rotated = await service.refreshAccessToken(refreshToken.value, home);

      expect(rotated.accessToken).toBe('access-1-ROLE_USER-2');
      expect(rotated.refreshToken.value).not.toBe(refreshToken.value);
      expect(rotated.refreshToken.issuedAt).toEqual(new Date(T0.getTime() + HOUR_MS));
      expect(rotated.refreshToken.expiresAt).toEqual(new Date(T0.getTime() + HOUR_MS + 7 * DAY_MS));
      expect((await store.findByValue(refreshToken.value))?.revoked).toBe(true);
      expect(await activeCount('1')).toBe(1);
      await dispatcher.drain();
      expect(sink.alerts).toEqual([]);
    });

    it('treats reuse of a rotated token as a replay and revokes every session of the customer', async () => {
      const first = await login();
      const laptop = await login();
      const rotated = await service.refreshAccessToken(first.refreshToken.value, home);

      await expect(service.refreshAccessToken(first.refreshToken.value, elsewhere)).rejects.toBeInstanceOf(
        RefreshTokenReplayError,
      );

      expect((await store.findByValue(rotated.refreshToken.value))?.revoked).toBe(true);
      expect((await store.findByValue(laptop.refreshToken.value))?.revoked).toBe(true);
      expect(await activeCount('1')).toBe(0);
      await expect(service.refreshAccessToken(rotated.refreshToken.value, home)).rejects.toBeInstanceOf(
        RefreshTokenReplayError,
      );

      await dispatcher.drain();
      expect(sink.alerts[0]).toEqual({
        kind: 'compromise',
        customerRef: '1',
        ip: '203.0.113.9',
        userAgent: FIREFOX_UA,
        reason: 'revoked token reused',
      });
    });

    it('lets exactly one of two concurrent rotations of the same token succeed', async () => {
      build(new GatedTokenStore());
      const { refreshToken } = await login();

      const results = await Promise.allSettled([
        service.refreshAccessToken(refreshToken.value, home),
        service.refreshAccessToken(refreshToken.value, home),
      ]);

      const fulfilled = results.filter((r) => r.status === 'fulfilled');
      const rejected = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
      expect(fulfilled).toHaveLength(1);
      expect(rejected).toHaveLength(1);
      expect(rejected[0].reason).toBeInstanceOf(ConcurrentRotationError);
      // losing the race is not a replay: the winner's successor stays usable
      expect(await activeCount('1')).toBe(1);
      await dispatcher.drain();
      expect(sink.alerts).toEqual([]);
    });

    it('reports an expired token as expired even when it is also revoked', async () => {
      const stale = await login();
      clock.advance(HOUR_MS);
      const current = await login();
      await service.revoke(stale.refreshToken.value);
      clock.advance(7 * DAY_MS - HOUR_MS + 1);

      await expect(service.refreshAccessToken(stale.refreshToken.value, home)).rejects.toBeInstanceOf(
        RefreshTokenExpiredError,
      );
      expect((await store.findByValue(current.refreshToken.value))?.revoked).toBe(false);
      await dispatcher.drain();
      expect(sink.alerts).toEqual([]);
    });

    it('still accepts a token at the exact expiry instant', async () => {
      const { refreshToken } = await login();
      clock.advance(7 * DAY_MS);

      await expect(service.refreshAccessToken(refreshToken.value, home)).resolves.toMatchObject({
        customer: { id: '1' },
      });
    });

    it('rejects an unknown value without touching the store', async () => {
      await expect(service.refreshAccessToken('no-such-token', home)).rejects.toBeInstanceOf(
        RefreshTokenNotFoundError,
      );
      expect(store.all()).toEqual([]);
    });

    it('rotates from a new device and raises a new-device alert', async () => {
      const { refreshToken } = await login();

      const rotated = await service.refreshAccessToken(refreshToken.value, elsewhere);

      expect(rotated.refreshToken.ipAddress).toBe('203.0.113.9');
      expect(rotated.refreshToken.deviceInfo).toBe('Ubuntu - Firefox - Desktop');
      await dispatcher.drain();
      expect(sink.alerts).toEqual([
        { kind: 'new-device', customerRef: '1', ip: '203.0.113.9', userAgent: FIREFOX_UA },
      ]);
    });

    it('does not let a failing alert sink affect the rotation', async () => {
      sink.failure = new Error('smtp down');
      const { refreshToken } = await login();

      await expect(service.refreshAccessToken(refreshToken.value, elsewhere)).resolves.toMatchObject({
        customer: { id: '1' },
      });
      await expect(dispatcher.drain()).resolves.toBeUndefined();
      expect(sink.alerts).toHaveLength(1);
    });

    it('fails without spending the token when the customer behind it is gone', async () => {
      const orphan = await store.create({
        customerRef: '99',
        ipAddress: null,
        userAgent: null,
        deviceInfo: null,
        issuedAt: T0,
        expiresAt: new Date(T0.getTime() + DAY_MS),
      });

      await expect(service.refreshAccessToken(orphan.value, home)).rejects.toBeInstanceOf(RefreshTokenNotFoundError);
      expect(store.all()).toEqual([orphan]);
    });

    it('leaves the parent usable when the successor cannot be stored', async () => {
      const { refreshToken } = await login();
      jest.spyOn(store, 'rotate').mockRejectedValueOnce(new Error('insert failed'));

      await expect(service.refreshAccessToken(refreshToken.value, home)).rejects.toThrow('insert failed');
      expect((await store.findByValue(refreshToken.value))?.revoked).toBe(false);

      const retried = await service.refreshAccessToken(refreshToken.value, home);

      expect(retried.refreshToken.customerRef).toBe('1');
      expect(await activeCount('1')).toBe(1);
      await dispatcher.drain();
      expect(sink.alerts).toEqual([]);
    });

    it('writes nothing when the access token cannot be signed', async () => {
      const { refreshToken } = await login();
      jest.spyOn(issuer, 'issue').mockRejectedValueOnce(new Error('signing key unavailable'));

      await expect(service.refreshAccessToken(refreshToken.value, home)).rejects.toThrow('signing key unavailable');
      expect(store.all()).toEqual([refreshToken]);

      await expect(service.refreshAccessToken(refreshToken.value, home)).resolves.toMatchObject({
        customer: { id: '1' },
      });
    });

    it('cuts an over-long user-agent to the column width', async () => {
      const { refreshToken } = await login({ ip: '10.0.0.1', userAgent: `${CHROME_UA} ${'x'.repeat(400)}` });

      expect(refreshToken.userAgent).toHaveLength(255);
      expect(refreshToken.deviceInfo).toBe('Windows 10 - Chrome - Desktop');
    });
  });

  describe('revoke', () => {
    it('is idempotent and ignores unknown values', async () => {
      const { refreshToken } = await login();

      await service.revoke(refreshToken.value);
      await service.revoke(refreshToken.value);
      await service.revoke('no-such-token');

      expect((await store.findByValue(refreshToken.value))?.revoked).toBe(true);
      expect(store.all()).toHaveLength(1);
    });
  });

  describe('activeSessions', () => {
    it('lists only the usable tokens, newest first', async () => {
      const older = await login();
      clock.advance(HOUR_MS);
      const newer = await login(elsewhere);
      const spent = await login();
      await service.revoke(spent.refreshToken.value);

      const sessions = await service.activeSessions('1');

      expect(sessions.map((s) => s.value)).toEqual([newer.refreshToken.value, older.refreshToken.value]);
    });
  });
});
