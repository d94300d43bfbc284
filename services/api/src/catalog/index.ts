// src/catalog/index.ts
import type { ProductService } from './provider';
import { DefaultProductService } from './productService';
import { getHttpClient } from '../http/client';
import { config } from '../config';

let _service: ProductService | null = null;

export function getProductService(): ProductService {
  if (_service) return _service;

  _service = new DefaultProductService({
    client: getHttpClient(),
    lookupDelayMs: config.product.lookupDelayMs,
  });
  return _service;
}
