/**
 * Cached tunnel directory used to name logbook entries and answer searches
 */
import type { Tunnel } from '../api/types.js';
import type { TunnelflightApi } from '../api/tunnelflight-api.js';
import { type EnhancedLogger, LogContext } from '../utils/logger.js';

export type TunnelSource = Pick<TunnelflightApi, 'getTunnels'>;

// Names used when the directory cannot be fetched
const KNOWN_TUNNELS: Readonly<Record<number, string>> = {
  225: 'Milton Keynes iFLY',
  228: 'SF Bay iFLY',
  230: 'Paraclete XP SkyVenture',
  242: 'Manchester iFLY',
  248: 'Basingstoke iFLY',
  249: 'InFlight Dubai',
  250: 'Toronto - Oakville iFLY',
  264: 'Downunder iFLY',
};

// Code-point order, the same as countries()
const byTitle = (a: Tunnel, b: Tunnel) => (a.title < b.title ? -1 : a.title > b.title ? 1 : 0);

export class TunnelDirectory {
  private readonly tunnels: Map<number, Tunnel> = new Map();

  constructor(private readonly logger: EnhancedLogger) {}

  public get size(): number {
    return this.tunnels.size;
  }

  /**
   * Fill the cache from the API when it is empty
   * @returns Every cached tunnel
   */
  public async load(api: TunnelSource): Promise<Tunnel[]> {
    if (this.tunnels.size === 0) {
      const tunnels = await api.getTunnels();
      for (const tunnel of tunnels) {
        this.tunnels.set(tunnel.id, tunnel);
      }
      this.logger.debug(`Cached ${this.tunnels.size} tunnels`, LogContext.SERVICE);
    }
    return Array.from(this.tunnels.values());
  }

  /**
   * Tunnel name for an id, from the directory or the built-in list
   */
  public async getTunnelName(id: number, api: TunnelSource): Promise<string> {
    try {
      await this.load(api);
    } catch (error) {
      this.logger.warn(
        `Could not load tunnel directory: ${error instanceof Error ? error.message : String(error)}`,
        LogContext.SERVICE
      );
    }

    const tunnel = this.tunnels.get(id);
    if (tunnel) {
      return tunnel.title;
    }
    return KNOWN_TUNNELS[id] ?? `Tunnel ID ${id}`;
  }

  /**
   * Case-insensitive search on title or city, and on country
   */
  public search(term?: string, country?: string): Tunnel[] {
    const needle = term?.trim().toLowerCase() ?? '';
    const place = country?.trim().toLowerCase() ?? '';

    return Array.from(this.tunnels.values())
      .filter(tunnel => {
        if (needle && !tunnel.title.toLowerCase().includes(needle) && !tunnel.city.toLowerCase().includes(needle)) {
          return false;
        }
        return !place || tunnel.country.toLowerCase().includes(place);
      })
      .sort(byTitle);
  }

  /**
   * Sorted unique countries that have a tunnel
   */
  public countries(): string[] {
    const countries = new Set<string>();
    for (const tunnel of this.tunnels.values()) {
      if (tunnel.country) {
        countries.add(tunnel.country);
      }
    }
    return Array.from(countries).sort();
  }
}
