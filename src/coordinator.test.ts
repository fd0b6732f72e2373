import { describe, it, expect, vi, afterEach } from 'vitest';
import { TunnelflightCoordinator } from './coordinator.js';
import { buildSkills } from './api/user-data.js';
import type { UserData } from './api/types.js';
import { EnhancedLogger } from './utils/logger.js';

function userData(overrides: Partial<UserData> = {}): UserData {
  return {
    skills: buildSkills(null),
    skillsByCategory: {},
    logbookEntries: [],
    raw: {},
    ...overrides,
  };
}

function createCoordinator(getUserData: () => Promise<UserData | null>) {
  const sink = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
  const source = { username: 'bruce', getUserData: vi.fn(getUserData) };
  const coordinator = new TunnelflightCoordinator(source, new EnhancedLogger(sink, 'normal', false));
  return { coordinator, source, sink };
}

describe('TunnelflightCoordinator', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('stores fresh data and announces it', async () => {
    const data = userData({ paymentStatus: 'Active' });
    const { coordinator } = createCoordinator(async () => data);
    const onUpdate = vi.fn();
    coordinator.on('update', onUpdate);

    await expect(coordinator.refresh()).resolves.toBe(data);

    expect(coordinator.data).toBe(data);
    expect(coordinator.lastUpdateSuccess).toBe(true);
    expect(coordinator.lastUpdated).toBeInstanceOf(Date);
    expect(onUpdate).toHaveBeenCalledWith(data);
  });

  it('shares one fetch between concurrent refreshes', async () => {
    const { coordinator, source } = createCoordinator(async () => userData());

    const first = coordinator.refresh();
    const second = coordinator.refresh();

    expect(second).toBe(first);
    await first;
    expect(source.getUserData).toHaveBeenCalledTimes(1);

    await coordinator.refresh();
    expect(source.getUserData).toHaveBeenCalledTimes(2);
  });

  it('keeps the previous data when a refresh fails', async () => {
    const data = userData({ paymentStatus: 'Active' });
    const { coordinator, source } = createCoordinator(async () => data);
    await coordinator.refresh();

    source.getUserData.mockResolvedValueOnce(null);
    const onFailed = vi.fn();
    coordinator.on('failed', onFailed);

    await expect(coordinator.refresh()).resolves.toBe(data);
    expect(coordinator.lastUpdateSuccess).toBe(true);
    expect(onFailed).toHaveBeenCalledTimes(1);
  });

  it('reports failure when there is no data at all', async () => {
    const { coordinator, sink } = createCoordinator(async () => {
      throw new Error('network down');
    });
    coordinator.on('failed', () => undefined);

    await expect(coordinator.refresh()).resolves.toBeNull();
    expect(coordinator.lastUpdateSuccess).toBe(false);
    expect(sink.error).toHaveBeenCalledWith('[COORDINATOR] Failed to get data for bruce: network down');
  });

  it('adds a logged flight to the total', async () => {
    const { coordinator } = createCoordinator(async () => userData({ totalFlightTime: '10:15' }));
    await coordinator.refresh();
    const onUpdate = vi.fn();
    coordinator.on('update', onUpdate);

    coordinator.applyLoggedFlight(50, 1700000000);

    expect(coordinator.data?.totalFlightTime).toBe('11:05');
    expect(coordinator.data?.totalFlightTimeHours).toBe(11);
    expect(coordinator.data?.totalFlightTimeMinutes).toBe(5);
    expect(coordinator.data?.lastFlight).toBe(1700000000);
    expect(onUpdate).toHaveBeenCalledTimes(1);
  });

  it('counts an unparsable total as zero', async () => {
    const { coordinator } = createCoordinator(async () => userData({ totalFlightTime: '12h' }));
    await coordinator.refresh();

    coordinator.applyLoggedFlight(30, 1700000000);

    expect(coordinator.data?.totalFlightTime).toBe('0:30');
  });

  it('polls on an interval until stopped', () => {
    vi.useFakeTimers();
    const { coordinator, source } = createCoordinator(async () => userData());

    coordinator.start(1000);
    vi.advanceTimersByTime(1000);
    expect(source.getUserData).toHaveBeenCalledTimes(1);

    coordinator.stop();
    vi.advanceTimersByTime(5000);
    expect(source.getUserData).toHaveBeenCalledTimes(1);
  });
});
