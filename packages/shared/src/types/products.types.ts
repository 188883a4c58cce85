/**
 * Marketplace Product Types
 */

import type { JsonObject } from './json.types.js';

/** Product detail as the gateway describes it; `code` is always present */
export interface ProductDetail extends JsonObject {
  code: string;
}

/** A cached lookup result: a detail, or `null` for "queried and absent" */
export type ProductCacheValue = ProductDetail | null;

export interface ProductDetailMap {
  plugin: Record<string, ProductCacheValue>;
  theme: Record<string, ProductCacheValue>;
}
