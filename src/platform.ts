/**
 * Tunnelflight Homebridge Platform
 * Signs in to each configured Tunnelflight account, keeps its data fresh
 * and publishes one accessory per account plus a services accessory for
 * the logbook operations.
 */
import type {
  API,
  Characteristic,
  DynamicPlatformPlugin,
  Logger,
  PlatformAccessory,
  PlatformConfig,
  Service
} from 'homebridge';
import { TunnelflightApi } from './api/tunnelflight-api.js';
import { TunnelflightAccessory } from './accessory.js';
import { TunnelflightServicesAccessory } from './services-accessory.js';
import { TunnelflightCoordinator } from './coordinator.js';
import { LogbookService } from './services/logbook-service.js';
import { type AccountConfig, parsePlatformConfig, type PluginSettings } from './config.js';
import { EnhancedLogger, LogContext, resolveLogLevel } from './utils/logger.js';
import { PLATFORM_NAME, PLUGIN_NAME } from './settings.js';

const SERVICES_ACCESSORY_ID = 'tunnelflight_services';

/**
 * Tunnelflight Platform
 * This class is the entry point for the plugin and manages the plugin lifecycle
 */
export class TunnelflightPlatform implements DynamicPlatformPlugin {
  public readonly Service: typeof Service;
  public readonly Characteristic: typeof Characteristic;

  // Accessories restored from the Homebridge cache
  public readonly accessories: PlatformAccessory[] = [];

  public readonly log: EnhancedLogger;
  public readonly settings: PluginSettings;
  public readonly logbook: LogbookService;

  private readonly coordinators: Map<string, TunnelflightCoordinator> = new Map();
  private readonly accessoryInstances: Map<string, TunnelflightAccessory> = new Map();
  private servicesAccessory?: TunnelflightServicesAccessory;

  /**
   * @param logger - Homebridge logger instance
   * @param config - Configuration from config.json
   * @param homebridgeApi - Reference to the Homebridge API
   */
  constructor(
    logger: Logger,
    public readonly config: PlatformConfig,
    public readonly homebridgeApi: API
  ) {
    this.Service = this.homebridgeApi.hap.Service;
    this.Characteristic = this.homebridgeApi.hap.Characteristic;

    this.log = new EnhancedLogger(logger, resolveLogLevel(config.logLevel, config.debugMode), true);
    this.settings = parsePlatformConfig(config, this.log);
    this.logbook = new LogbookService(this.log);

    this.log.verbose(
      `Platform configuration: ${JSON.stringify({
        accounts: this.settings.accounts.map(account => account.username),
        pollingInterval: this.settings.pollingInterval,
        logLevel: this.settings.logLevel,
        quickLogs: this.settings.quickLogs.length,
        tunnelSearches: this.settings.tunnelSearches.length,
        exposeSkillSensors: this.settings.exposeSkillSensors
      })}`,
      LogContext.PLATFORM
    );

    if (this.settings.accounts.length === 0) {
      this.log.error('No Tunnelflight accounts configured! The plugin will not work.', LogContext.PLATFORM);
    }

    this.log.info(
      `Initializing ${PLATFORM_NAME} platform with ${this.settings.accounts.length} account(s) ` +
      `and ${this.settings.pollingInterval}s polling interval`,
      LogContext.PLATFORM
    );

    // When this event is fired, homebridge has restored all cached accessories
    this.homebridgeApi.on('didFinishLaunching', () => {
      this.log.info('Homebridge finished launching, setting up accounts', LogContext.PLATFORM);
      this.setupAccounts().catch(error => {
        this.log.error(
          `Error setting up accounts: ${error instanceof Error ? error.message : String(error)}`,
          LogContext.PLATFORM
        );
      });
    });

    this.homebridgeApi.on('shutdown', () => {
      this.log.info('Shutting down platform', LogContext.PLATFORM);
      this.shutdown();
    });
  }

  public get exposeSkillSensors(): boolean {
    return this.settings.exposeSkillSensors;
  }

  /**
   * Called by Homebridge when cached accessories are restored at startup
   */
  configureAccessory(accessory: PlatformAccessory): void {
    this.log.info(`Loading accessory from cache: ${accessory.displayName}`, LogContext.PLATFORM);

    if (this.log.isVerboseEnabled()) {
      this.log.verbose(`Accessory context: ${JSON.stringify(accessory.context)}`, LogContext.PLATFORM);
    }

    this.accessories.push(accessory);
  }

  /**
   * Create the API client, coordinator and accessory of every account
   */
  async setupAccounts(): Promise<void> {
    const activeUuids = new Set<string>();

    for (const account of this.settings.accounts) {
      try {
        const uuid = await this.setupAccount(account);
        activeUuids.add(uuid);
      } catch (error) {
        this.log.error(
          `Error setting up account ${account.username}: ${error instanceof Error ? error.message : String(error)}`,
          LogContext.PLATFORM
        );
      }
    }

    if (this.logbook.accountCount > 0) {
      activeUuids.add(this.setupServicesAccessory());
    }

    this.cleanupInactiveAccessories(activeUuids);
    this.log.info('Account setup completed', LogContext.PLATFORM);
  }

  /**
   * @returns UUID of the account's accessory
   */
  private async setupAccount(account: AccountConfig): Promise<string> {
    const api = new TunnelflightApi(account.username, account.password, this.log);

    // Bad credentials are reported now; the coordinator keeps retrying on each poll
    if (await api.login()) {
      this.log.info(`Logged in to Tunnelflight as ${api.username}`, LogContext.PLATFORM);
    } else {
      this.log.error(
        `Unable to log in as ${api.username}. Check the username and password.`,
        LogContext.PLATFORM
      );
    }

    const coordinator = new TunnelflightCoordinator(api, this.log);
    const data = await coordinator.refresh();
    if (!data) {
      this.log.warn(
        `Could not fetch data for ${api.username} yet, will retry every ${this.settings.pollingInterval}s`,
        LogContext.PLATFORM
      );
    }
    this.coordinators.set(api.username, coordinator);

    const uuid = this.homebridgeApi.hap.uuid.generate(`tunnelflight_${api.username}`);
    const accessory = this.findOrCreateAccessory(uuid, account.name);

    this.accessoryInstances.get(api.username)?.cleanup();
    this.accessoryInstances.set(
      api.username,
      new TunnelflightAccessory(this, accessory, coordinator, { name: account.name, username: api.username })
    );

    this.logbook.registerAccount(api, coordinator);
    coordinator.start(this.settings.pollingInterval * 1000);
    return uuid;
  }

  private setupServicesAccessory(): string {
    const uuid = this.homebridgeApi.hap.uuid.generate(SERVICES_ACCESSORY_ID);
    const accessory = this.findOrCreateAccessory(uuid, 'Tunnelflight Services');

    this.servicesAccessory?.cleanup();
    this.servicesAccessory = new TunnelflightServicesAccessory(
      this,
      accessory,
      this.logbook,
      this.settings.tunnelSearches,
      this.settings.quickLogs
    );
    return uuid;
  }

  private findOrCreateAccessory(uuid: string, displayName: string): PlatformAccessory {
    const existingAccessory = this.accessories.find(acc => acc.UUID === uuid);
    if (existingAccessory) {
      this.log.info(`Restoring accessory from cache: ${existingAccessory.displayName}`, LogContext.PLATFORM);
      if (existingAccessory.displayName !== displayName) {
        existingAccessory.displayName = displayName;
      }
      this.homebridgeApi.updatePlatformAccessories([existingAccessory]);
      return existingAccessory;
    }

    this.log.info(`Adding new accessory: ${displayName}`, LogContext.PLATFORM);
    const accessory = new this.homebridgeApi.platformAccessory(displayName, uuid);
    this.homebridgeApi.registerPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
    this.accessories.push(accessory);
    return accessory;
  }

  /**
   * Unregister cached accessories of accounts no longer configured
   */
  private cleanupInactiveAccessories(activeUuids: Set<string>): void {
    const accessoriesToRemove = this.accessories.filter(accessory => !activeUuids.has(accessory.UUID));
    if (accessoriesToRemove.length === 0) {
      return;
    }

    this.log.info(`Removing ${accessoriesToRemove.length} inactive accessories`, LogContext.PLATFORM);
    this.homebridgeApi.unregisterPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, accessoriesToRemove);

    for (const accessory of accessoriesToRemove) {
      const index = this.accessories.indexOf(accessory);
      if (index !== -1) {
        this.accessories.splice(index, 1);
      }
    }
  }

  private shutdown(): void {
    this.coordinators.forEach((coordinator, username) => {
      coordinator.stop();
      this.logbook.unregister(username);
    });
    this.accessoryInstances.forEach(accessory => accessory.cleanup());
    this.servicesAccessory?.cleanup();
  }
}
