// src/catalog/provider.ts
import type { ProductId, ProductRecord, RemoteItem } from '../types';

export interface ProductService {
  fetchProduct(id: ProductId): Promise<ProductRecord>;
  fetchRemoteItem(id: ProductId): Promise<RemoteItem>; // rejects with RemoteFetchError
}
