import type { EntityStore } from '../storage/interfaces.js';

/**
 * A product whose counts are written to its own file. `productId` is null
 * for the pseudo-product that covers every entity.
 */
export interface ProductTarget {
  name: string;
  productId: number | null;
}

/**
 * The all-entities pseudo-product first, then every product by name
 */
export async function listProductTargets(
  store: EntityStore,
  allProductsLabel: string
): Promise<ProductTarget[]> {
  const products = await store.listProducts();
  return [
    { name: allProductsLabel, productId: null },
    ...products.map(p => ({ name: p.name, productId: p.id })),
  ];
}
