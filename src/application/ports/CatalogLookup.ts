export interface ProductSnapshot {
	productId: string;
	name: string;
	sku: string | null;
	price: number;
}

export interface CatalogLookup {
	getProductSnapshot(storeId: string, productId: string): Promise<ProductSnapshot | null>;
}
