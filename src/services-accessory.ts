/**
 * Tunnelflight Services Accessory
 * Momentary switches that run the logbook services: list the countries
 * with tunnels, run a configured tunnel search, or log a configured flight.
 */
import type { Characteristic, CharacteristicValue, PlatformAccessory, Service } from 'homebridge';
import type { TunnelflightPlatform } from './platform.js';
import type { QuickLogConfig, TunnelSearchConfig } from './config.js';
import { type LogbookService, type Notification, ServiceCallError } from './services/logbook-service.js';
import { LogContext } from './utils/logger.js';
import { MANUFACTURER, SWITCH_RESET_MS } from './settings.js';

export class TunnelflightServicesAccessory {
  private readonly Characteristic: typeof Characteristic;
  private readonly resetTimers: Set<NodeJS.Timeout> = new Set();

  constructor(
    private readonly platform: TunnelflightPlatform,
    private readonly accessory: PlatformAccessory,
    private readonly logbook: LogbookService,
    tunnelSearches: TunnelSearchConfig[],
    quickLogs: QuickLogConfig[]
  ) {
    this.Characteristic = this.platform.Characteristic;

    const informationService = this.accessory.getService(this.platform.Service.AccessoryInformation) ||
      this.accessory.addService(this.platform.Service.AccessoryInformation);
    informationService
      .setCharacteristic(this.Characteristic.Manufacturer, MANUFACTURER)
      .setCharacteristic(this.Characteristic.Model, 'Tunnelflight Services')
      .setCharacteristic(this.Characteristic.SerialNumber, 'tunnelflight-services');

    const subtypes = new Set<string>();

    this.addSwitch('list_countries', 'List Countries', subtypes, async () => {
      this.logNotification(await this.logbook.listCountries());
    });

    tunnelSearches.forEach((search, index) => {
      this.addSwitch(`search_${index}`, search.name, subtypes, async () => {
        this.logNotification(await this.logbook.findTunnels({
          search_term: search.searchTerm ?? '',
          country: search.country ?? '',
        }));
      });
    });

    quickLogs.forEach((quickLog, index) => {
      this.addSwitch(`log_${index}`, quickLog.name, subtypes, async () => {
        const result = await this.logbook.logFlightTime({
          tunnel_id: quickLog.tunnelId,
          time: quickLog.minutes,
          comment: quickLog.comment ?? '',
          username: quickLog.username,
        });
        if (result.success) {
          this.platform.log.info(
            `${quickLog.name}: logged ${quickLog.minutes} minutes at ${result.tunnelName}`,
            LogContext.SERVICE
          );
        } else {
          this.platform.log.warn(`${quickLog.name}: ${result.message}`, LogContext.SERVICE);
        }
      });
    });

    // Switches for searches or quick logs removed from the config
    for (const service of [...this.accessory.services]) {
      if (service.UUID === this.platform.Service.Switch.UUID && !subtypes.has(service.subtype ?? '')) {
        this.platform.log.debug(`Removing switch ${service.displayName}`, LogContext.HOMEKIT);
        this.accessory.removeService(service);
      }
    }

    this.platform.log.info(`Services accessory initialized with ${subtypes.size} switches`, LogContext.HOMEKIT);
  }

  private addSwitch(subtype: string, name: string, subtypes: Set<string>, action: () => Promise<void>): void {
    subtypes.add(subtype);

    const service = this.accessory.getServiceById(this.platform.Service.Switch, subtype) ||
      this.accessory.addService(this.platform.Service.Switch, name, subtype);
    service.setCharacteristic(this.Characteristic.Name, name);

    service.getCharacteristic(this.Characteristic.On)
      .onGet(() => false)
      .onSet((value: CharacteristicValue) => {
        if (value === true) {
          this.trigger(service, name, action);
        }
      });
  }

  /**
   * Run a switch action and turn the switch back off
   */
  private trigger(service: Service, name: string, action: () => Promise<void>): void {
    this.platform.log.debug(`Switch triggered: ${name}`, LogContext.SERVICE);

    action().catch(error => {
      if (error instanceof ServiceCallError) {
        this.platform.log.error(`${name}: ${error.message}`, LogContext.SERVICE);
      } else {
        this.platform.log.error(
          `${name} failed: ${error instanceof Error ? error.message : String(error)}`,
          LogContext.SERVICE
        );
      }
    });

    const timer = setTimeout(() => {
      this.resetTimers.delete(timer);
      service.updateCharacteristic(this.Characteristic.On, false);
    }, SWITCH_RESET_MS);
    this.resetTimers.add(timer);
  }

  private logNotification(notification: Notification): void {
    this.platform.log.info(`${notification.title}\n${notification.message}`, LogContext.SERVICE);
  }

  public cleanup(): void {
    for (const timer of this.resetTimers) {
      clearTimeout(timer);
    }
    this.resetTimers.clear();
  }
}
