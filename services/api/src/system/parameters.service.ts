import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { isJsonObject, type JsonObject, type JsonValue, type ParameterKey } from '@tidewater/shared';
import { ParameterEntity } from './parameter.entity';

@Injectable()
export class ParametersService {
  constructor(
    @InjectRepository(ParameterEntity)
    private readonly parameterRepository: Repository<ParameterEntity>,
  ) {}

  /**
   * Raw stored value, `undefined` when the key was never written
   */
  async get(key: ParameterKey): Promise<JsonValue | undefined> {
    const parameter = await this.parameterRepository.findOne({ where: { key } });
    return parameter ? parameter.value : undefined;
  }

  async getNumber(key: ParameterKey, fallback: number): Promise<number> {
    const value = await this.get(key);
    const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN;
    return Number.isFinite(parsed) ? parsed : fallback;
  }

  async getString(key: ParameterKey): Promise<string | null> {
    const value = await this.get(key);
    if (typeof value === 'string') {
      return value;
    }
    return typeof value === 'number' ? String(value) : null;
  }

  async getObject(key: ParameterKey): Promise<JsonObject> {
    const value = await this.get(key);
    return isJsonObject(value) ? value : {};
  }

  async set(key: ParameterKey, value: JsonValue): Promise<void> {
    await this.parameterRepository.save({ key, value });
  }

  /**
   * Writes several parameters in one call
   */
  async setMany(values: Partial<Record<ParameterKey, JsonValue>>): Promise<void> {
    const rows = Object.entries(values).map(([key, value]) => ({ key, value: value ?? null }));
    if (rows.length > 0) {
      await this.parameterRepository.save(rows);
    }
  }
}
