import type { PoolClient } from "pg";
import { type AddressSnapshot, Order, type OrderStatus } from "@domain/entities/Order";
import { OrderItem } from "@domain/entities/OrderItem";
import { ConcurrentModificationError, errorMessage, isDomainError } from "@domain/errors/DomainError";
import type {
	FindOrderOptions,
	OrderListQuery,
	OrderRepository,
	PageRequest,
} from "@domain/repositories/OrderRepository";
import { insertStructures, makeGrouping } from "../bulkOperations";
import { DbContext } from "../dbContext";

type OrderRow = {
	orders_id: string;
	orders_store_id: string;
	orders_order_number: string;
	orders_customer_id: string;
	orders_status: OrderStatus;
	orders_subtotal: string;
	orders_tax_amount: string;
	orders_shipping_amount: string;
	orders_discount_amount: string;
	orders_total_amount: string;
	orders_currency: string;
	orders_shipping_address: AddressSnapshot;
	orders_billing_address: AddressSnapshot;
	orders_notes: string | null;
	orders_cancellation_reason: string | null;
	orders_order_date: Date;
	orders_shipped_date: Date | null;
	orders_delivered_date: Date | null;
	orders_version: number;
};

type OrderItemRow = {
	order_items_id: string;
	order_items_order_id: string;
	order_items_product_id: string;
	order_items_product_name: string;
	order_items_product_sku: string | null;
	order_items_quantity: number;
	order_items_unit_price: string;
	order_items_total_price: string;
};

export class PostgreOrderRepository implements OrderRepository {
	static orderSql = `
  orders.id AS orders_id,
  orders.store_id AS orders_store_id,
  orders.order_number AS orders_order_number,
  orders.customer_id AS orders_customer_id,
  orders.status AS orders_status,
  orders.subtotal AS orders_subtotal,
  orders.tax_amount AS orders_tax_amount,
  orders.shipping_amount AS orders_shipping_amount,
  orders.discount_amount AS orders_discount_amount,
  orders.total_amount AS orders_total_amount,
  orders.currency AS orders_currency,
  orders.shipping_address AS orders_shipping_address,
  orders.billing_address AS orders_billing_address,
  orders.notes AS orders_notes,
  orders.cancellation_reason AS orders_cancellation_reason,
  orders.order_date AS orders_order_date,
  orders.shipped_date AS orders_shipped_date,
  orders.delivered_date AS orders_delivered_date,
  orders.version AS orders_version
`;

	static orderItemSql = `
  order_items.id AS order_items_id,
  order_items.order_id AS order_items_order_id,
  order_items.product_id AS order_items_product_id,
  order_items.product_name AS order_items_product_name,
  order_items.product_sku AS order_items_product_sku,
  order_items.quantity AS order_items_quantity,
  order_items.unit_price AS order_items_unit_price,
  order_items.total_price AS order_items_total_price
`;

	private loadOrderItem(row: OrderItemRow): OrderItem {
		return OrderItem.loadOrderItem({
			id: row.order_items_id,
			orderId: row.order_items_order_id,
			productId: row.order_items_product_id,
			productName: row.order_items_product_name,
			productSku: row.order_items_product_sku,
			quantity: row.order_items_quantity,
			unitPrice: Number(row.order_items_unit_price),
			totalPrice: Number(row.order_items_total_price),
		});
	}

	private loadOrder(row: OrderRow, items: OrderItemRow[]): Order {
		return Order.loadOrder({
			id: row.orders_id,
			storeId: row.orders_store_id,
			orderNumber: row.orders_order_number,
			customerId: row.orders_customer_id,
			status: row.orders_status,
			items: items.map((item) => this.loadOrderItem(item)),
			totals: {
				subtotal: Number(row.orders_subtotal),
				taxAmount: Number(row.orders_tax_amount),
				shippingAmount: Number(row.orders_shipping_amount),
				discountAmount: Number(row.orders_discount_amount),
				totalAmount: Number(row.orders_total_amount),
			},
			currency: row.orders_currency,
			shippingAddress: row.orders_shipping_address,
			billingAddress: row.orders_billing_address,
			notes: row.orders_notes,
			cancellationReason: row.orders_cancellation_reason,
			orderDate: row.orders_order_date,
			shippedDate: row.orders_shipped_date,
			deliveredDate: row.orders_delivered_date,
			version: row.orders_version,
		});
	}

	private getOrderDbStructure(order: Order) {
		const totals = order.getTotals();
		return {
			id: order.getId(),
			store_id: order.getStoreId(),
			order_number: order.getOrderNumber(),
			customer_id: order.getCustomerId(),
			status: order.getStatus(),
			subtotal: totals.subtotal,
			tax_amount: totals.taxAmount,
			shipping_amount: totals.shippingAmount,
			discount_amount: totals.discountAmount,
			total_amount: totals.totalAmount,
			currency: order.getCurrency(),
			shipping_address: JSON.stringify(order.getShippingAddress()),
			billing_address: JSON.stringify(order.getBillingAddress()),
			notes: order.getNotes(),
			cancellation_reason: order.getCancellationReason(),
			order_date: order.getOrderDate(),
			shipped_date: order.getShippedDate(),
			delivered_date: order.getDeliveredDate(),
			version: order.getVersion(),
		};
	}

	private getOrderItemDbStructure(order: Order, item: OrderItem) {
		return {
			id: item.getId(),
			store_id: order.getStoreId(),
			order_id: order.getId(),
			product_id: item.getProductId(),
			product_name: item.getProductName(),
			product_sku: item.getProductSku(),
			quantity: item.getQuantity(),
			unit_price: item.getUnitPrice(),
			total_price: item.getTotalPrice(),
		};
	}

	private async findItems(
		client: PoolClient,
		storeId: string,
		orderIds: string[]
	): Promise<OrderItemRow[]> {
		const sql = `
    SELECT
      ${PostgreOrderRepository.orderItemSql}
    FROM fulfillment.order_items
    WHERE order_items.store_id = $1
    AND order_items.order_id = ANY($2)
    ORDER BY order_items.id
`;
		const { rows } = await client.query<OrderItemRow>(sql, [storeId, orderIds]);
		return rows;
	}

	async findById(
		storeId: string,
		id: string,
		options: FindOrderOptions = {}
	): Promise<Order | null> {
		try {
			const sql = `
    SELECT
      ${PostgreOrderRepository.orderSql}
    FROM fulfillment.orders
    WHERE orders.store_id = $1
    AND orders.id = $2
    ${options.forUpdate ? "FOR UPDATE" : ""}
`;
			const client = DbContext.getClient();
			const { rows, rowCount } = await client.query<OrderRow>(sql, [storeId, id]);

			if (rowCount === 0) {
				return null;
			}

			const items = await this.findItems(client, storeId, [id]);
			return this.loadOrder(rows[0], items);
		} catch (error) {
			console.error(`Error finding order by id ${id}:`, error);
			throw new Error(`Failed to find order: ${errorMessage(error)}`);
		}
	}

	private async loadOrders(
		client: PoolClient,
		storeId: string,
		rows: OrderRow[]
	): Promise<Order[]> {
		if (rows.length === 0) {
			return [];
		}

		const items = await this.findItems(
			client,
			storeId,
			rows.map((row) => row.orders_id)
		);
		const itemsByOrder = makeGrouping(items, (item) => item.order_items_order_id);

		return rows.map((row) => this.loadOrder(row, itemsByOrder.get(row.orders_id) ?? []));
	}

	async findByOrderNumber(storeId: string, orderNumber: string): Promise<Order | null> {
		try {
			const sql = `
    SELECT
      ${PostgreOrderRepository.orderSql}
    FROM fulfillment.orders
    WHERE orders.store_id = $1
    AND orders.order_number = $2
`;
			const client = DbContext.getClient();
			const { rows } = await client.query<OrderRow>(sql, [storeId, orderNumber]);

			const [order] = await this.loadOrders(client, storeId, rows);
			return order ?? null;
		} catch (error) {
			console.error(`Error finding order by number ${orderNumber}:`, error);
			throw new Error(`Failed to find order: ${errorMessage(error)}`);
		}
	}

	async findByCustomerId(
		storeId: string,
		customerId: string,
		page: PageRequest
	): Promise<Order[]> {
		try {
			const sql = `
    SELECT
      ${PostgreOrderRepository.orderSql}
    FROM fulfillment.orders
    WHERE orders.store_id = $1
    AND orders.customer_id = $2
    ORDER BY orders.order_date DESC, orders.id DESC
    LIMIT $3 OFFSET $4
`;

			const client = DbContext.getClient();
			const { rows } = await client.query<OrderRow>(sql, [
				storeId,
				customerId,
				page.size,
				page.page * page.size,
			]);

			return this.loadOrders(client, storeId, rows);
		} catch (error) {
			console.error(`Error finding orders by customer id ${customerId}:`, error);
			throw new Error(`Failed to find orders: ${errorMessage(error)}`);
		}
	}

	async list(storeId: string, query: OrderListQuery): Promise<Order[]> {
		try {
			const sql = `
    SELECT
      ${PostgreOrderRepository.orderSql}
    FROM fulfillment.orders
    WHERE orders.store_id = $1
    AND ($2::text IS NULL OR orders.status = $2)
    ORDER BY orders.order_date DESC, orders.id DESC
    LIMIT $3 OFFSET $4
`;

			const client = DbContext.getClient();
			const { rows } = await client.query<OrderRow>(sql, [
				storeId,
				query.status ?? null,
				query.size,
				query.page * query.size,
			]);

			return this.loadOrders(client, storeId, rows);
		} catch (error) {
			console.error(`Error listing orders of store ${storeId}:`, error);
			throw new Error(`Failed to list orders: ${errorMessage(error)}`);
		}
	}

	async countByStatus(storeId: string): Promise<Partial<Record<OrderStatus, number>>> {
		try {
			const sql = `
    SELECT orders.status AS status, COUNT(*) AS total
    FROM fulfillment.orders
    WHERE orders.store_id = $1
    GROUP BY orders.status
`;
			const client = DbContext.getClient();
			const { rows } = await client.query<{ status: OrderStatus; total: string }>(sql, [
				storeId,
			]);

			const counts: Partial<Record<OrderStatus, number>> = {};
			for (const row of rows) {
				counts[row.status] = Number(row.total);
			}
			return counts;
		} catch (error) {
			console.error(`Error counting orders of store ${storeId}:`, error);
			throw new Error(`Failed to count orders: ${errorMessage(error)}`);
		}
	}

	async save(order: Order): Promise<void> {
		try {
			const client = DbContext.getClient();
			await insertStructures([this.getOrderDbStructure(order)], "fulfillment.orders", client);
			await insertStructures(
				order.getItems().map((item) => this.getOrderItemDbStructure(order, item)),
				"fulfillment.order_items",
				client
			);
			order.setWasUpdated(false);
		} catch (error) {
			console.error(`Error saving order ${order.getId()}:`, error);
			throw new Error(`Failed to save order: ${errorMessage(error)}`);
		}
	}

	async update(order: Order): Promise<void> {
		if (!order.getWasUpdated()) return;

		try {
			const sql = `
    UPDATE fulfillment.orders
    SET status = $1,
        cancellation_reason = $2,
        shipped_date = $3,
        delivered_date = $4,
        version = version + 1,
        updated_at = NOW()
    WHERE store_id = $5
    AND id = $6
    AND version = $7
`;
			const client = DbContext.getClient();
			const { rowCount } = await client.query(sql, [
				order.getStatus(),
				order.getCancellationReason(),
				order.getShippedDate(),
				order.getDeliveredDate(),
				order.getStoreId(),
				order.getId(),
				order.getVersion(),
			]);

			if (rowCount === 0) {
				throw new ConcurrentModificationError("Order", order.getId());
			}

			order.setVersion(order.getVersion() + 1);
			order.setWasUpdated(false);
		} catch (error) {
			if (isDomainError(error)) throw error;
			console.error(`Error updating order ${order.getId()}:`, error);
			throw new Error(`Failed to update order: ${errorMessage(error)}`);
		}
	}
}
