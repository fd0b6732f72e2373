import { describe, it, expect, vi } from 'vitest';
import { TunnelDirectory } from './tunnel-directory.js';
import type { Tunnel } from '../api/types.js';
import { EnhancedLogger } from '../utils/logger.js';

function tunnel(id: number, title: string, country: string, city: string): Tunnel {
  return { id, title, country, city, size: '14ft', manufacturer: 'Unknown', address: '', status: 'Active' };
}

const TUNNELS = [
  tunnel(12, 'Bravo Hall', 'Norway', 'Oslo'),
  tunnel(7, 'Alpha Tunnel', 'United Kingdom', 'Bedford'),
  tunnel(225, 'Milton Keynes Live', 'United Kingdom', 'Milton Keynes'),
];

function createDirectory() {
  const sink = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
  return { directory: new TunnelDirectory(new EnhancedLogger(sink, 'normal', false)), sink };
}

describe('TunnelDirectory', () => {
  it('loads the directory once', async () => {
    const { directory } = createDirectory();
    const api = { getTunnels: vi.fn(async () => TUNNELS) };

    await directory.load(api);
    await directory.load(api);

    expect(api.getTunnels).toHaveBeenCalledTimes(1);
    expect(directory.size).toBe(3);
  });

  it('names tunnels from the directory, then the built-in list', async () => {
    const { directory } = createDirectory();
    const api = { getTunnels: vi.fn(async () => TUNNELS) };

    await expect(directory.getTunnelName(12, api)).resolves.toBe('Bravo Hall');
    await expect(directory.getTunnelName(242, api)).resolves.toBe('Manchester iFLY');
    await expect(directory.getTunnelName(999, api)).resolves.toBe('Tunnel ID 999');
  });

  it('falls back to the built-in list when the directory cannot load', async () => {
    const { directory, sink } = createDirectory();
    const api = {
      getTunnels: vi.fn(async (): Promise<Tunnel[]> => {
        throw new Error('offline');
      }),
    };

    await expect(directory.getTunnelName(225, api)).resolves.toBe('Milton Keynes iFLY');
    expect(sink.warn).toHaveBeenCalledWith('[SERVICE] Could not load tunnel directory: offline');
  });

  it('searches title or city and country, sorted by title', async () => {
    const { directory } = createDirectory();
    await directory.load({ getTunnels: async () => TUNNELS });

    expect(directory.search('alpha').map(t => t.id)).toEqual([7]);
    expect(directory.search('OSLO').map(t => t.id)).toEqual([12]);
    expect(directory.search('', 'united').map(t => t.title)).toEqual(['Alpha Tunnel', 'Milton Keynes Live']);
    expect(directory.search('milton', 'norway')).toEqual([]);
    expect(directory.search().map(t => t.title)).toEqual(['Alpha Tunnel', 'Bravo Hall', 'Milton Keynes Live']);
  });

  it('orders titles by code point', async () => {
    const { directory } = createDirectory();
    await directory.load({
      getTunnels: async () => [
        tunnel(1, 'iFLY Oslo', 'Norway', 'Oslo'),
        tunnel(2, 'Indoor Skydive', 'Norway', 'Voss'),
        tunnel(3, 'Airspace', 'Norway', 'Bergen'),
      ],
    });

    expect(directory.search().map(t => t.title)).toEqual(['Airspace', 'Indoor Skydive', 'iFLY Oslo']);
  });

  it('lists unique countries in order', async () => {
    const { directory } = createDirectory();
    await directory.load({ getTunnels: async () => TUNNELS });

    expect(directory.countries()).toEqual(['Norway', 'United Kingdom']);
  });
});
