import type { ProductId, ProductRecord } from '../types';

export const PRODUCT_PRICE = 49.99;

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Simulated storage lookup: waits `lookupDelayMs`, then builds the record.
 * Deterministic for a given id and never fails.
 */
export async function fetchProduct(id: ProductId, lookupDelayMs: number): Promise<ProductRecord> {
  await delay(lookupDelayMs);

  return {
    id,
    name: `Product ${id}`,
    price: PRODUCT_PRICE,
  };
}
