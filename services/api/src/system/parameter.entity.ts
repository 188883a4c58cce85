import { Entity, PrimaryColumn, Column, UpdateDateColumn } from 'typeorm';
import type { JsonValue } from '@tidewater/shared';

/**
 * Persisted key/value parameter, keyed `namespace::group.item`.
 */
@Entity('system_parameters')
export class ParameterEntity {
  @PrimaryColumn({ type: 'varchar', length: 191 })
  key!: string;

  @Column({ type: 'jsonb', nullable: true })
  value!: JsonValue | null;

  @UpdateDateColumn()
  updatedAt!: Date;
}
