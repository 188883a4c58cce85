/**
 * Update Negotiator
 *
 * Asks the gateway which updates exist for this installation and keeps the
 * outstanding count with a 24 hour retry window.
 */
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  encodeBase64Json,
  isJsonObject,
  PARAMETER_KEYS,
  UnitKind,
  UPDATE_TIMING,
  type JsonObject,
  type JsonValue,
  type UpdateNegotiationResult,
  type UpdateOffer,
} from '@tidewater/shared';
import { GatewayInvalidResponseError } from '../common/errors';
import { parseFlag } from '../common/config.util';
import { GatewayClientService } from '../gateway/gateway-client.service';
import { ParametersService } from '../system/parameters.service';
import { InstalledUnitsService } from '../system/installed-units.service';
import { CoreBuildService } from '../system/core-build.service';
import { ThemeInstallationsService } from '../units/theme-installations.service';

function stringOrNull(value: JsonValue | undefined): string | null {
  if (typeof value === 'string') {
    return value;
  }
  return typeof value === 'number' ? String(value) : null;
}

function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

@Injectable()
export class UpdateNegotiator {
  private readonly logger = new Logger(UpdateNegotiator.name);
  private readonly coreUpdatesDisabled: boolean;

  constructor(
    configService: ConfigService,
    private readonly gateway: GatewayClientService,
    private readonly parameters: ParametersService,
    private readonly installedUnits: InstalledUnitsService,
    private readonly themes: ThemeInstallationsService,
    private readonly coreBuild: CoreBuildService,
  ) {
    this.coreUpdatesDisabled = parseFlag(configService.get<string>('DISABLE_CORE_UPDATES'), true);
  }

  /**
   * Number of outstanding updates. The gateway is only asked when no
   * updates are known and the retry window has passed, or when forced.
   */
  async check(force = false): Promise<number> {
    const count = await this.parameters.getNumber(PARAMETER_KEYS.UPDATE_COUNT, 0);
    if (count > 0) {
      return count;
    }

    const retryAfter = await this.parameters.getNumber(PARAMETER_KEYS.UPDATE_RETRY, 0);
    if (!force && retryAfter > nowSeconds()) {
      return count;
    }

    let newCount = 0;
    try {
      newCount = (await this.negotiate(force)).updateCount;
    } catch (error) {
      this.logger.warn(`Update check failed: ${error instanceof Error ? error.message : String(error)}`);
    }

    await this.persist(newCount);
    return newCount;
  }

  async negotiate(force = false): Promise<UpdateNegotiationResult> {
    const installed = await this.installedUnits.all(UnitKind.PLUGIN);
    const installedThemes = await this.themes.getInstalled();
    const oldBuild = await this.coreBuild.getBuild();

    const versions: JsonObject = {};
    for (const unit of installed) {
      versions[unit.code] = unit.version;
    }

    const response = await this.gateway.requestData('core/update', {
      core: await this.coreBuild.getHash(),
      plugins: encodeBase64Json(versions),
      themes: encodeBase64Json(Object.keys(installedThemes)),
      build: oldBuild,
      force,
    });

    if (!isJsonObject(response)) {
      throw new GatewayInvalidResponseError('update list is not an object');
    }

    let updateCount = Math.max(0, Number(response.update) || 0);
    const localUnits = new Map(installed.map((unit) => [unit.code, unit]));

    const pluginOffers: Record<string, UpdateOffer> = {};
    const plugins = response.plugins;
    if (isJsonObject(plugins)) {
      for (const [code, info] of Object.entries(plugins)) {
        const details = isJsonObject(info) ? info : {};
        const local = localUnits.get(code);

        if (local && (local.isFrozen || !local.isUpdatable)) {
          updateCount = this.discount(updateCount, code);
          continue;
        }

        pluginOffers[code] = {
          code,
          targetVersion: stringOrNull(details.version),
          targetHash: stringOrNull(details.hash),
          name: local ? local.name : code,
          oldVersion: local ? local.version : false,
          icon: local && local.icon ? local.icon : false,
          details,
        };
      }
    }

    const themeOffers: Record<string, UpdateOffer> = {};
    const themes = response.themes;
    if (isJsonObject(themes)) {
      for (const [code, info] of Object.entries(themes)) {
        if (Object.hasOwn(installedThemes, code)) {
          continue;
        }
        const details = isJsonObject(info) ? info : {};
        themeOffers[code] = {
          code,
          targetVersion: stringOrNull(details.version),
          targetHash: stringOrNull(details.hash),
          details,
        };
      }
    }

    let coreOffer: UpdateOffer | undefined;
    const core = response.core;
    if (isJsonObject(core)) {
      if (this.coreUpdatesDisabled) {
        updateCount = this.discount(updateCount, 'core');
      } else {
        coreOffer = {
          code: 'core',
          targetVersion: stringOrNull(core.build),
          targetHash: stringOrNull(core.hash),
          oldBuild,
          details: core,
        };
      }
    }

    updateCount += Object.keys(themeOffers).length;
    await this.persist(updateCount);

    return {
      ...(coreOffer ? { coreOffer } : {}),
      pluginOffers,
      themeOffers,
      updateCount,
      hasUpdates: updateCount > 0,
    };
  }

  private discount(count: number, code: string): number {
    if (count === 0) {
      this.logger.warn(`Excluded update for ${code} was not part of the reported count`);
    }
    return Math.max(0, count - 1);
  }

  private async persist(count: number): Promise<void> {
    await this.parameters.setMany({
      [PARAMETER_KEYS.UPDATE_COUNT]: count,
      [PARAMETER_KEYS.UPDATE_RETRY]: nowSeconds() + UPDATE_TIMING.RETRY_HOURS * 3600,
    });
  }
}
