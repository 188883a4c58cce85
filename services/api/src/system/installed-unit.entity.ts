import {
  Entity,
  PrimaryColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';
import { UnitKind, type InstalledUnitRecord } from '@tidewater/shared';

@Entity('installed_units')
export class InstalledUnitEntity implements InstalledUnitRecord {
  @PrimaryColumn({ type: 'varchar', length: 191 })
  code!: string;

  @Column({ type: 'varchar', length: 16, default: UnitKind.PLUGIN })
  @Index()
  kind!: UnitKind;

  @Column({ type: 'varchar', length: 50 })
  version!: string;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({ type: 'varchar', length: 255, nullable: true })
  icon!: string | null;

  // Updates suppressed by an administrator
  @Column({ type: 'boolean', default: false })
  isFrozen!: boolean;

  @Column({ type: 'boolean', default: true })
  isUpdatable!: boolean;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
