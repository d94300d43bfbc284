/**
 * Fan-out/join over the product service.
 *
 * Flow:
 *  1. Start the product lookup and the remote fetch without awaiting either.
 *  2. Wait for both to settle, so wall time is the slower branch, not the sum.
 *  3. Fail with UpstreamError if any branch rejected; otherwise compose the result.
 */
import { UpstreamError } from '../errors';
import type { ProductService } from '../catalog/provider';
import type { CombinedResult, ProductId } from '../types';

export const COMBINED_MESSAGE = 'This is an example of async/await that keeps the server responsive.';

export class CombinedHandler {
  constructor(private readonly service: ProductService) {}

  async handle(id: ProductId): Promise<CombinedResult> {
    const productTask = this.service.fetchProduct(id);
    const remoteTask = this.service.fetchRemoteItem(id);

    // join first, inspect afterwards: a rejection never cuts the other branch short
    const [product, remoteItem] = await Promise.allSettled([productTask, remoteTask]);

    if (product.status === 'rejected') throw new UpstreamError('product', product.reason);
    if (remoteItem.status === 'rejected') throw new UpstreamError('remote', remoteItem.reason);

    return {
      product: product.value,
      remoteItem: remoteItem.value,
      message: COMBINED_MESSAGE,
    };
  }
}
