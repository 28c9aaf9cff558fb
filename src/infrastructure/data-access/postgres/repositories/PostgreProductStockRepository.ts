import { ProductStock } from "@domain/entities/ProductStock";
import { errorMessage } from "@domain/errors/DomainError";
import type { ProductStockRepository } from "@domain/repositories/ProductStockRepository";
import { DbContext } from "../dbContext";

type ProductRow = {
	products_id: string;
	products_store_id: string;
	products_name: string;
	products_sku: string | null;
	products_quantity: number;
	products_low_stock_threshold: number;
	products_track_inventory: boolean;
};

export class PostgreProductStockRepository implements ProductStockRepository {
	static productSql = `
  products.id AS products_id,
  products.store_id AS products_store_id,
  products.name AS products_name,
  products.sku AS products_sku,
  products.quantity AS products_quantity,
  products.low_stock_threshold AS products_low_stock_threshold,
  products.track_inventory AS products_track_inventory
`;

	private loadProductStock(row: ProductRow): ProductStock {
		return ProductStock.loadProductStock({
			productId: row.products_id,
			storeId: row.products_store_id,
			name: row.products_name,
			sku: row.products_sku,
			quantity: row.products_quantity,
			lowStockThreshold: row.products_low_stock_threshold,
			trackInventory: row.products_track_inventory,
		});
	}

	async findById(
		storeId: string,
		productId: string,
		options: { forUpdate?: boolean } = {}
	): Promise<ProductStock | null> {
		try {
			const sql = `
    SELECT
      ${PostgreProductStockRepository.productSql}
    FROM fulfillment.products
    WHERE products.store_id = $1
    AND products.id = $2
    ${options.forUpdate ? "FOR UPDATE" : ""}
`;
			const client = DbContext.getClient();
			const { rows, rowCount } = await client.query<ProductRow>(sql, [storeId, productId]);

			if (rowCount === 0) {
				return null;
			}

			return this.loadProductStock(rows[0]);
		} catch (error) {
			console.error(`Error finding product ${productId}:`, error);
			throw new Error(`Failed to find product: ${errorMessage(error)}`);
		}
	}

	async findLowStock(storeId: string): Promise<ProductStock[]> {
		try {
			const sql = `
    SELECT
      ${PostgreProductStockRepository.productSql}
    FROM fulfillment.products
    WHERE products.store_id = $1
    AND products.track_inventory
    AND products.quantity <= products.low_stock_threshold
    ORDER BY products.quantity ASC
`;
			const client = DbContext.getClient();
			const { rows } = await client.query<ProductRow>(sql, [storeId]);

			return rows.map((row) => this.loadProductStock(row));
		} catch (error) {
			console.error(`Error finding low stock products of store ${storeId}:`, error);
			throw new Error(`Failed to find low stock products: ${errorMessage(error)}`);
		}
	}

	async update(stock: ProductStock): Promise<void> {
		if (!stock.getWasUpdated()) return;

		try {
			const sql = `
    UPDATE fulfillment.products
    SET quantity = $1,
        low_stock_threshold = $2,
        updated_at = NOW()
    WHERE store_id = $3
    AND id = $4
`;
			const client = DbContext.getClient();
			await client.query(sql, [
				stock.getQuantity(),
				stock.getLowStockThreshold(),
				stock.getStoreId(),
				stock.getId(),
			]);
			stock.setWasUpdated(false);
		} catch (error) {
			console.error(`Error updating stock of product ${stock.getId()}:`, error);
			throw new Error(`Failed to update product stock: ${errorMessage(error)}`);
		}
	}
}
