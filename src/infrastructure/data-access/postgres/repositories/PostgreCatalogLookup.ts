import type { CatalogLookup, ProductSnapshot } from "@/application/ports/CatalogLookup";
import { errorMessage } from "@/domain/errors/DomainError";
import { DbContext } from "../dbContext";

type ProductSnapshotRow = {
	id: string;
	name: string;
	sku: string | null;
	price: string;
};

export class PostgreCatalogLookup implements CatalogLookup {
	async getProductSnapshot(
		storeId: string,
		productId: string
	): Promise<ProductSnapshot | null> {
		try {
			const client = DbContext.getClient();
			const { rows, rowCount } = await client.query<ProductSnapshotRow>(
				`SELECT id, name, sku, price
         FROM fulfillment.products
         WHERE store_id = $1 AND id = $2`,
				[storeId, productId]
			);

			if (rowCount === 0) {
				return null;
			}

			const row = rows[0];
			return { productId: row.id, name: row.name, sku: row.sku, price: Number(row.price) };
		} catch (error) {
			console.error(`Error looking up product ${productId}:`, error);
			throw new Error(`Failed to look up product: ${errorMessage(error)}`);
		}
	}
}
