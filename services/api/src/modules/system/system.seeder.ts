import type { QueryRunner } from 'typeorm';
import { EMPTY_CORE_HASH, PARAMETER_KEYS } from '@tidewater/shared';
import type { Notice, Seedable } from '../../units/unit.types';

const INITIAL_PARAMETERS: Array<[string, string | number | boolean]> = [
  [PARAMETER_KEYS.CORE_HASH, EMPTY_CORE_HASH],
  [PARAMETER_KEYS.CORE_MODIFIED, false],
  [PARAMETER_KEYS.UPDATE_COUNT, 0],
];

/**
 * Writes the parameters a fresh installation starts with.
 */
export class SystemSeeder implements Seedable {
  async seed(queryRunner: QueryRunner): Promise<Notice> {
    for (const [key, value] of INITIAL_PARAMETERS) {
      await queryRunner.query(
        `INSERT INTO "system_parameters" ("key", "value") VALUES ($1, $2::jsonb) ON CONFLICT ("key") DO NOTHING`,
        [key, JSON.stringify(value)],
      );
    }

    return `Initialized ${INITIAL_PARAMETERS.length} system parameters`;
  }
}
