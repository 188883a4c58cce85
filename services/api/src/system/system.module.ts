import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ParameterEntity } from './parameter.entity';
import { InstalledUnitEntity } from './installed-unit.entity';
import { ParametersService } from './parameters.service';
import { InstalledUnitsService } from './installed-units.service';
import { CoreBuildService } from './core-build.service';

@Module({
  imports: [TypeOrmModule.forFeature([ParameterEntity, InstalledUnitEntity])],
  providers: [ParametersService, InstalledUnitsService, CoreBuildService],
  exports: [ParametersService, InstalledUnitsService, CoreBuildService],
})
export class SystemModule {}
