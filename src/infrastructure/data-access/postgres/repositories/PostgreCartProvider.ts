import type {
	CartLine,
	CartProvider,
	CartSnapshot,
	CartStatus,
} from "@/application/ports/CartProvider";
import { errorMessage } from "@/domain/errors/DomainError";
import { DbContext } from "../dbContext";

type CartRow = {
	shopping_carts_id: string;
	shopping_carts_customer_id: string;
	shopping_carts_status: CartStatus;
	shopping_carts_expires_at: Date | null;
	cart_items_product_id: string | null;
	cart_items_quantity: number | null;
	cart_items_unit_price: string | null;
};

/** Reads carts owned by the storefront; this service only converts them. */
export class PostgreCartProvider implements CartProvider {
	async getCartById(storeId: string, cartId: string): Promise<CartSnapshot | null> {
		try {
			const sql = `
    SELECT
      shopping_carts.id AS shopping_carts_id,
      shopping_carts.customer_id AS shopping_carts_customer_id,
      shopping_carts.status AS shopping_carts_status,
      shopping_carts.expires_at AS shopping_carts_expires_at,
      cart_items.product_id AS cart_items_product_id,
      cart_items.quantity AS cart_items_quantity,
      cart_items.unit_price AS cart_items_unit_price
    FROM fulfillment.shopping_carts
    LEFT JOIN fulfillment.cart_items
      ON cart_items.cart_id = shopping_carts.id
      AND cart_items.store_id = shopping_carts.store_id
    WHERE shopping_carts.store_id = $1
    AND shopping_carts.id = $2
    ORDER BY cart_items.created_at ASC
`;
			const client = DbContext.getClient();
			const { rows, rowCount } = await client.query<CartRow>(sql, [storeId, cartId]);

			if (rowCount === 0) {
				return null;
			}

			const header = rows[0];
			const items: CartLine[] = [];
			for (const row of rows) {
				if (row.cart_items_product_id === null) continue;
				items.push({
					productId: row.cart_items_product_id,
					quantity: row.cart_items_quantity ?? 0,
					unitPrice: Number(row.cart_items_unit_price ?? 0),
				});
			}
			const expiresAt = header.shopping_carts_expires_at;

			return {
				id: header.shopping_carts_id,
				customerId: header.shopping_carts_customer_id,
				status: header.shopping_carts_status,
				isActive: header.shopping_carts_status === "ACTIVE",
				isEmpty: items.length === 0,
				isExpired: expiresAt !== null && expiresAt.getTime() <= Date.now(),
				items,
			};
		} catch (error) {
			console.error(`Error reading cart ${cartId}:`, error);
			throw new Error(`Failed to read cart: ${errorMessage(error)}`);
		}
	}

	async clearCart(storeId: string, cartId: string): Promise<void> {
		try {
			const client = DbContext.getClient();
			await client.query(
				"DELETE FROM fulfillment.cart_items WHERE store_id = $1 AND cart_id = $2",
				[storeId, cartId]
			);
			await client.query(
				`UPDATE fulfillment.shopping_carts
         SET status = 'CONVERTED', updated_at = NOW()
         WHERE store_id = $1 AND id = $2`,
				[storeId, cartId]
			);
		} catch (error) {
			console.error(`Error clearing cart ${cartId}:`, error);
			throw new Error(`Failed to clear cart: ${errorMessage(error)}`);
		}
	}
}
