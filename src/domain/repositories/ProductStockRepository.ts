import type { ProductStock } from "../entities/ProductStock";

export interface ProductStockRepository {
	findById(
		storeId: string,
		productId: string,
		options?: { forUpdate?: boolean }
	): Promise<ProductStock | null>;
	/** Tracked products at or below their low-stock threshold. */
	findLowStock(storeId: string): Promise<ProductStock[]>;
	update(stock: ProductStock): Promise<void>;
}
