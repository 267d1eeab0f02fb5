import { DAY_MS, FakeClock, T0, testConfig } from '../testing/fakes';
import { InMemoryTokenStore } from './in-memory-token.store';
import { RefreshTokenCleanupService } from './refresh-token-cleanup.service';

describe('RefreshTokenCleanupService', () => {
  const expiringAt = (store: InMemoryTokenStore, expiresAt: Date) =>
    store.create({ customerRef: '1', ipAddress: null, userAgent: null, deviceInfo: null, issuedAt: T0, expiresAt });

  it('deletes only tokens that expired before the grace window', async () => {
    const store = new InMemoryTokenStore();
    const clock = new FakeClock(new Date(T0.getTime() + 40 * DAY_MS));
    const service = new RefreshTokenCleanupService(store, testConfig(), clock);
    await expiringAt(store, new Date(T0.getTime() + 5 * DAY_MS));
    const recent = await expiringAt(store, new Date(T0.getTime() + 20 * DAY_MS));

    expect(await service.runOnce()).toBe(1);
    expect(store.all()).toEqual([recent]);
  });

  it('reports zero when the store fails', async () => {
    const store = new InMemoryTokenStore();
    jest.spyOn(store, 'deleteExpiredOlderThan').mockRejectedValue(new Error('connection lost'));
    const service = new RefreshTokenCleanupService(store, testConfig(), new FakeClock());

    await expect(service.runOnce()).resolves.toBe(0);
  });

  it('schedules a sweep only when enabled', () => {
    jest.useFakeTimers();
    try {
      const store = new InMemoryTokenStore();
      const sweep = jest.spyOn(store, 'deleteExpiredOlderThan');
      const config = testConfig({ cleanup: { enabled: true, intervalMs: 1_000, graceMs: DAY_MS } });
      const service = new RefreshTokenCleanupService(store, config, new FakeClock());

      service.onModuleInit();
      jest.advanceTimersByTime(2_500);
      service.onModuleDestroy();
      jest.advanceTimersByTime(5_000);

      expect(sweep).toHaveBeenCalledTimes(2);
      expect(sweep).toHaveBeenCalledWith(new Date(T0.getTime() - DAY_MS));
    } finally {
      jest.useRealTimers();
    }
  });
});
