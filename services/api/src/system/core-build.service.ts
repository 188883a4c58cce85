import { Injectable } from '@nestjs/common';
import { EMPTY_CORE_HASH, PARAMETER_KEYS } from '@tidewater/shared';
import { ParametersService } from './parameters.service';

/**
 * Bookkeeping of the installed core build and its content hash.
 */
@Injectable()
export class CoreBuildService {
  constructor(private readonly parameters: ParametersService) {}

  /**
   * Hash identifying the installed core, md5("NULL") until a build is recorded
   */
  async getHash(): Promise<string> {
    return (await this.parameters.getString(PARAMETER_KEYS.CORE_HASH)) ?? EMPTY_CORE_HASH;
  }

  async getBuild(): Promise<string | null> {
    return this.parameters.getString(PARAMETER_KEYS.CORE_BUILD);
  }

  async setBuild(build: string, hash?: string, modified = false): Promise<void> {
    await this.parameters.setMany({
      [PARAMETER_KEYS.CORE_BUILD]: build,
      [PARAMETER_KEYS.CORE_MODIFIED]: modified,
      ...(hash ? { [PARAMETER_KEYS.CORE_HASH]: hash } : {}),
    });
  }
}
