import type { ProductService } from './provider';
import { fetchProduct } from './products';
import { fetchRemoteItem } from './todos';
import type { JsonClient } from '../http/jsonClient';
import type { ProductId, ProductRecord, RemoteItem } from '../types';

export interface ProductServiceOptions {
  /**
   * Shared client for the remote JSON API. Never created per call.
   */
  client: JsonClient;
  /**
   * Simulated latency of the product lookup, in milliseconds.
   */
  lookupDelayMs: number;
}

export class DefaultProductService implements ProductService {
  private readonly client: JsonClient;
  private readonly lookupDelayMs: number;

  constructor(options: ProductServiceOptions) {
    this.client = options.client;
    this.lookupDelayMs = options.lookupDelayMs;
  }

  fetchProduct(id: ProductId): Promise<ProductRecord> {
    return fetchProduct(id, this.lookupDelayMs);
  }

  fetchRemoteItem(id: ProductId): Promise<RemoteItem> {
    return fetchRemoteItem(this.client, id);
  }
}
