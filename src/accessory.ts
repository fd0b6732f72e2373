/**
 * Tunnelflight Account Accessory
 * Presents one member account to HomeKit: membership and currency as
 * contact sensors, skill levels as occupancy sensors, and a switch that
 * refreshes the account on demand.
 */
import type { Characteristic, CharacteristicValue, PlatformAccessory, Service } from 'homebridge';
import type { TunnelflightPlatform } from './platform.js';
import type { TunnelflightCoordinator } from './coordinator.js';
import type { UserData } from './api/types.js';
import {
  buildAccountEntities,
  isDisplayEntity,
  SKILL_ENTITY_KEYS,
  type DisplayEntity,
  type SkillEntityKey
} from './entities.js';
import { LogContext } from './utils/logger.js';
import { MANUFACTURER, MODEL, SWITCH_RESET_MS } from './settings.js';

export interface AccountInfo {
  name: string;
  username: string;
}

const SKILL_SENSOR_NAMES: Record<SkillEntityKey, string> = {
  static_level: 'Static',
  dynamic_level: 'Dynamic',
  formation_level: 'Formation',
};

export class TunnelflightAccessory {
  private readonly Characteristic: typeof Characteristic;
  private readonly informationService: Service;
  private readonly paymentService: Service;
  private readonly currencyService: Service;
  private readonly refreshService: Service;
  private readonly skillServices: Map<SkillEntityKey, Service> = new Map();

  private entities: DisplayEntity[] = [];
  private resetTimer?: NodeJS.Timeout;

  private readonly onUpdate = (data: UserData) => this.applyData(data);
  private readonly onFailed = () => this.markUnavailable();

  constructor(
    private readonly platform: TunnelflightPlatform,
    private readonly accessory: PlatformAccessory,
    private readonly coordinator: TunnelflightCoordinator,
    private readonly account: AccountInfo
  ) {
    this.Characteristic = this.platform.Characteristic;

    this.accessory.context.account = { ...account };

    this.informationService = this.accessory.getService(this.platform.Service.AccessoryInformation) ||
      this.accessory.addService(this.platform.Service.AccessoryInformation);
    this.informationService
      .setCharacteristic(this.Characteristic.Manufacturer, MANUFACTURER)
      .setCharacteristic(this.Characteristic.Model, MODEL)
      .setCharacteristic(this.Characteristic.SerialNumber, account.username);

    // Contact detected means membership paid / flyer current
    this.paymentService = this.contactSensor('payment_status', `${account.name} Payment Status`);
    this.currencyService = this.contactSensor('currency_flyer', `${account.name} Flyer Currency`);

    for (const key of SKILL_ENTITY_KEYS) {
      const existing = this.accessory.getServiceById(this.platform.Service.OccupancySensor, key);
      if (!this.platform.exposeSkillSensors) {
        if (existing) {
          this.accessory.removeService(existing);
        }
        continue;
      }

      const service = existing ||
        this.accessory.addService(this.platform.Service.OccupancySensor, `${account.name} ${SKILL_SENSOR_NAMES[key]}`, key);
      service.getCharacteristic(this.Characteristic.OccupancyDetected)
        .onGet(() => this.skillOccupancy(key));
      service.getCharacteristic(this.Characteristic.StatusActive)
        .onGet(() => this.isAvailable());
      this.skillServices.set(key, service);
    }

    this.refreshService = this.accessory.getServiceById(this.platform.Service.Switch, 'refresh') ||
      this.accessory.addService(this.platform.Service.Switch, `${account.name} Refresh Data`, 'refresh');
    this.refreshService.getCharacteristic(this.Characteristic.On)
      .onGet(() => false)
      .onSet(this.handleRefreshSet.bind(this));

    this.restoreCachedEntities();

    this.coordinator.on('update', this.onUpdate);
    this.coordinator.on('failed', this.onFailed);

    if (this.coordinator.data) {
      this.applyData(this.coordinator.data);
    }

    this.platform.log.info(`Accessory initialized: ${this.accessory.displayName} (${account.username})`, LogContext.HOMEKIT);
  }

  private contactSensor(subtype: string, name: string): Service {
    const service = this.accessory.getServiceById(this.platform.Service.ContactSensor, subtype) ||
      this.accessory.addService(this.platform.Service.ContactSensor, name, subtype);

    service.getCharacteristic(this.Characteristic.ContactSensorState)
      .onGet(() => this.contactState(subtype));
    service.getCharacteristic(this.Characteristic.StatusActive)
      .onGet(() => this.isAvailable());
    return service;
  }

  /**
   * Use the snapshot from the last run until the first refresh lands
   */
  private restoreCachedEntities(): void {
    const cached: unknown = this.accessory.context.entities;
    if (!Array.isArray(cached)) {
      return;
    }

    this.entities = cached.filter(isDisplayEntity).map(entity => ({ ...entity, available: false }));
    if (this.entities.length > 0) {
      this.platform.log.debug(
        `Restored ${this.entities.length} cached entities for ${this.account.username}`,
        LogContext.HOMEKIT
      );
      this.pushState();
    }
  }

  private entity(key: string): DisplayEntity | undefined {
    return this.entities.find(entity => entity.key === key);
  }

  private isAvailable(): boolean {
    return this.entities.length > 0 && this.entities.every(entity => entity.available);
  }

  private contactState(key: string): CharacteristicValue {
    return this.entity(key)?.state === true
      ? this.Characteristic.ContactSensorState.CONTACT_DETECTED
      : this.Characteristic.ContactSensorState.CONTACT_NOT_DETECTED;
  }

  private skillOccupancy(key: SkillEntityKey): CharacteristicValue {
    return Number(this.entity(key)?.state ?? 0) > 0
      ? this.Characteristic.OccupancyDetected.OCCUPANCY_DETECTED
      : this.Characteristic.OccupancyDetected.OCCUPANCY_NOT_DETECTED;
  }

  /**
   * Rebuild the entities from fresh account data and push them to HomeKit
   */
  private applyData(data: UserData): void {
    this.entities = buildAccountEntities(data, {
      accountName: this.account.name,
      username: this.account.username,
      available: this.coordinator.lastUpdateSuccess,
    });

    if (data.memberId) {
      this.informationService.updateCharacteristic(this.Characteristic.SerialNumber, data.memberId);
    }

    this.accessory.context.entities = this.entities;
    this.accessory.context.lastUpdated = this.coordinator.lastUpdated?.toISOString() ?? null;
    this.platform.homebridgeApi.updatePlatformAccessories([this.accessory]);

    this.platform.log.state(
      this.account.username,
      Object.fromEntries(this.entities.map(entity => [entity.key, entity.state]))
    );
    this.pushState();
  }

  private markUnavailable(): void {
    if (this.coordinator.lastUpdateSuccess) {
      return;
    }
    this.entities = this.entities.map(entity => ({ ...entity, available: false }));
    this.pushState();
  }

  private pushState(): void {
    const active = this.isAvailable();

    this.paymentService.updateCharacteristic(this.Characteristic.ContactSensorState, this.contactState('payment_status'));
    this.paymentService.updateCharacteristic(this.Characteristic.StatusActive, active);
    this.currencyService.updateCharacteristic(this.Characteristic.ContactSensorState, this.contactState('currency_flyer'));
    this.currencyService.updateCharacteristic(this.Characteristic.StatusActive, active);

    for (const [key, service] of this.skillServices) {
      service.updateCharacteristic(this.Characteristic.OccupancyDetected, this.skillOccupancy(key));
      service.updateCharacteristic(this.Characteristic.StatusActive, active);
    }
  }

  /**
   * Momentary switch: trigger a refresh, then turn back off
   */
  private handleRefreshSet(value: CharacteristicValue): void {
    if (value !== true) {
      return;
    }

    this.platform.log.info(`Refresh requested for ${this.account.username}`, LogContext.HOMEKIT);
    this.coordinator.refresh().catch(error => {
      this.platform.log.error(
        `Error refreshing ${this.account.username}: ${error instanceof Error ? error.message : String(error)}`,
        LogContext.HOMEKIT
      );
    });

    if (this.resetTimer) {
      clearTimeout(this.resetTimer);
    }
    this.resetTimer = setTimeout(() => {
      this.refreshService.updateCharacteristic(this.Characteristic.On, false);
      this.resetTimer = undefined;
    }, SWITCH_RESET_MS);
  }

  /**
   * Clean up resources when this accessory is removed
   */
  public cleanup(): void {
    this.coordinator.off('update', this.onUpdate);
    this.coordinator.off('failed', this.onFailed);

    if (this.resetTimer) {
      clearTimeout(this.resetTimer);
      this.resetTimer = undefined;
    }

    this.platform.log.info(`Cleaned up accessory: ${this.accessory.displayName}`, LogContext.HOMEKIT);
  }
}
