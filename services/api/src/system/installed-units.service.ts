import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { UnitKind } from '@tidewater/shared';
import { InstalledUnitEntity } from './installed-unit.entity';

/** Fields needed to record a freshly installed unit */
export interface NewInstalledUnit {
  code: string;
  kind: UnitKind;
  name: string;
  version: string;
  icon?: string | null;
}

@Injectable()
export class InstalledUnitsService {
  constructor(
    @InjectRepository(InstalledUnitEntity)
    private readonly unitRepository: Repository<InstalledUnitEntity>,
  ) {}

  async all(kind?: UnitKind): Promise<InstalledUnitEntity[]> {
    return this.unitRepository.find({
      where: kind ? { kind } : {},
      order: { createdAt: 'ASC' },
    });
  }

  async find(code: string): Promise<InstalledUnitEntity | null> {
    return this.unitRepository.findOne({ where: { code } });
  }

  /**
   * Creates the unit record, or refreshes name/icon/version of an existing one.
   */
  async record(unit: NewInstalledUnit): Promise<InstalledUnitEntity> {
    let entity = await this.find(unit.code);

    if (entity) {
      entity.name = unit.name;
      entity.version = unit.version;
      entity.icon = unit.icon ?? entity.icon;
    } else {
      entity = this.unitRepository.create({
        code: unit.code,
        kind: unit.kind,
        name: unit.name,
        version: unit.version,
        icon: unit.icon ?? null,
        isFrozen: false,
        isUpdatable: true,
      });
    }

    return this.unitRepository.save(entity);
  }

  async setVersion(code: string, version: string): Promise<void> {
    await this.unitRepository.update({ code }, { version });
  }

  async remove(code: string): Promise<boolean> {
    const result = await this.unitRepository.delete({ code });
    return (result.affected ?? 0) > 0;
  }

  /**
   * Install date of the oldest unit, reported to the gateway as `since`
   */
  async oldestInstallDate(): Promise<Date | null> {
    const [oldest] = await this.unitRepository.find({
      order: { createdAt: 'ASC' },
      take: 1,
    });
    return oldest ? oldest.createdAt : null;
  }
}
