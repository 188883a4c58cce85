import { DynamicModule, Global, Module } from '@nestjs/common';
import { SystemModule } from '../system/system.module';
import { UNIT_DEFINITIONS } from './units.constants';
import { UnitRegistry } from './unit-registry.service';
import { ThemeInstallationsService } from './theme-installations.service';
import type { UnitDefinitions } from './unit.types';

@Global()
@Module({})
export class UnitsModule {
  static forRoot(definitions: UnitDefinitions): DynamicModule {
    return {
      module: UnitsModule,
      imports: [SystemModule],
      providers: [
        { provide: UNIT_DEFINITIONS, useValue: definitions },
        UnitRegistry,
        ThemeInstallationsService,
      ],
      exports: [UnitRegistry, ThemeInstallationsService],
    };
  }
}
