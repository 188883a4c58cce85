import { Injectable } from '@nestjs/common';
import { PARAMETER_KEYS } from '@tidewater/shared';
import { ParametersService } from '../system/parameters.service';

/**
 * History of installed themes, stored as `{ code: directory }`.
 */
@Injectable()
export class ThemeInstallationsService {
  constructor(private readonly parameters: ParametersService) {}

  async getInstalled(): Promise<Record<string, string>> {
    const history = await this.parameters.getObject(PARAMETER_KEYS.THEME_HISTORY);
    const installed: Record<string, string> = {};
    for (const [code, dirName] of Object.entries(history)) {
      if (typeof dirName === 'string') {
        installed[code] = dirName;
      }
    }
    return installed;
  }

  async isInstalled(code: string): Promise<boolean> {
    const installed = await this.getInstalled();
    return Object.hasOwn(installed, code);
  }

  async setInstalled(code: string, dirName?: string): Promise<void> {
    const installed = await this.getInstalled();
    installed[code] = dirName ?? code.toLowerCase().split('.').join('-');
    await this.parameters.set(PARAMETER_KEYS.THEME_HISTORY, installed);
  }
}
