/**
 * Product Detail Cache
 *
 * Marketplace details are cached in two tiers: one map of every product
 * looked up (absent products stored as `null`) and a short-lived popular list
 * per product type.
 */
import { Injectable, Logger } from '@nestjs/common';
import {
  CACHE_KEYS,
  decodeJson,
  isJsonObject,
  ProductType,
  UPDATE_TIMING,
  type JsonValue,
  type ProductCacheValue,
  type ProductDetail,
  type ProductDetailMap,
} from '@tidewater/shared';
import { RedisService } from '../redis/redis.service';
import { GatewayClientService } from '../gateway/gateway-client.service';

export function isProductDetail(value: JsonValue | undefined): value is ProductDetail {
  return isJsonObject(value) && typeof value.code === 'string';
}

/**
 * Products of a gateway listing, which is either an array or an object keyed
 * by code.
 */
export function toProductList(value: JsonValue): ProductDetail[] {
  const items = Array.isArray(value) ? value : isJsonObject(value) ? Object.values(value) : [];
  return items.filter(isProductDetail);
}

/** Null-prototype section, so any product code is stored as an own key */
function emptySection(): Record<string, ProductCacheValue> {
  const section: Record<string, ProductCacheValue> = Object.create(null);
  return section;
}

@Injectable()
export class ProductCacheService {
  private readonly logger = new Logger(ProductCacheService.name);

  constructor(
    private readonly redis: RedisService,
    private readonly gateway: GatewayClientService,
  ) {}

  normalizeType(type: string): ProductType {
    return type === ProductType.THEME ? ProductType.THEME : ProductType.PLUGIN;
  }

  async load(): Promise<ProductDetailMap> {
    const map: ProductDetailMap = { plugin: emptySection(), theme: emptySection() };
    const raw = await this.redis.get(CACHE_KEYS.PRODUCT_DETAILS);
    if (!raw) {
      return map;
    }

    let stored: JsonValue;
    try {
      stored = decodeJson(raw);
    } catch (error) {
      this.logger.warn(`Discarding unreadable product cache: ${String(error)}`);
      return map;
    }

    if (!isJsonObject(stored)) {
      return map;
    }

    for (const type of [ProductType.PLUGIN, ProductType.THEME]) {
      const section = stored[type];
      if (!isJsonObject(section)) {
        continue;
      }
      for (const [code, entry] of Object.entries(section)) {
        if (entry === null) {
          map[type][code] = null;
        } else if (isProductDetail(entry)) {
          map[type][code] = entry;
        }
      }
    }

    return map;
  }

  async save(map: ProductDetailMap): Promise<void> {
    await this.redis.set(
      CACHE_KEYS.PRODUCT_DETAILS,
      JSON.stringify(map),
      UPDATE_TIMING.PRODUCT_DETAILS_TTL_SECONDS,
    );
  }

  cacheDetail(map: ProductDetailMap, type: ProductType, detail: ProductDetail): void {
    map[type][detail.code] = detail;
  }

  /**
   * Details of `codes`. Codes never seen before are fetched in a single
   * request; codes the gateway does not know are remembered as absent.
   */
  async lookup(type: string, codes: string[]): Promise<ProductDetail[]> {
    const productType = this.normalizeType(type);
    const wanted = [...new Set(codes)];
    const map = await this.load();
    const section = map[productType];
    const newCodes = wanted.filter((code) => !Object.hasOwn(section, code));

    if (newCodes.length > 0) {
      const response = await this.gateway.requestData(`${productType}/details`, { names: newCodes });

      for (const detail of toProductList(response)) {
        this.cacheDetail(map, productType, detail);
      }

      for (const code of newCodes) {
        if (!Object.hasOwn(section, code)) {
          section[code] = null;
        }
      }

      await this.save(map);
    }

    return wanted
      .map((code): ProductCacheValue | undefined => section[code])
      .filter((detail): detail is ProductDetail => detail !== null && detail !== undefined);
  }

  async popular(type: string): Promise<ProductDetail[]> {
    const productType = this.normalizeType(type);
    const cacheKey = `${CACHE_KEYS.POPULAR_PREFIX}${productType}`;
    const cached = await this.redis.get(cacheKey);

    if (cached) {
      try {
        return toProductList(decodeJson(cached));
      } catch (error) {
        this.logger.warn(`Discarding unreadable popular list ${cacheKey}: ${String(error)}`);
      }
    }

    const products = toProductList(await this.gateway.requestData(`${productType}/popular`));
    await this.redis.set(cacheKey, JSON.stringify(products), UPDATE_TIMING.POPULAR_TTL_SECONDS);

    const map = await this.load();
    for (const detail of products) {
      this.cacheDetail(map, productType, detail);
    }
    await this.save(map);

    return products;
  }

  /**
   * Drops the detail map and every popular list
   */
  async clear(): Promise<void> {
    await this.redis.del(CACHE_KEYS.PRODUCT_DETAILS);
    await this.redis.deleteByPrefix(CACHE_KEYS.POPULAR_PREFIX);
  }
}
