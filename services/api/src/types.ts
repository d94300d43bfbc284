export type ProductId = number;

export interface ProductRecord {
  id: ProductId;
  name: string;
  price: number;
}

export interface RemoteItem {
  id: number;
  ownerId: number;
  title: string;
  completed: boolean;
}

export interface CombinedResult {
  product: ProductRecord;
  remoteItem: RemoteItem;
  message: string;
}
