import type { Order, OrderStatus } from "../entities/Order";

export interface FindOrderOptions {
	/** Lock the order row until the surrounding transaction ends. */
	forUpdate?: boolean;
}

/** Zero-based page of `size` rows. */
export interface PageRequest {
	page: number;
	size: number;
}

export interface OrderListQuery extends PageRequest {
	status?: OrderStatus;
}

export interface OrderRepository {
	findById(storeId: string, id: string, options?: FindOrderOptions): Promise<Order | null>;
	findByOrderNumber(storeId: string, orderNumber: string): Promise<Order | null>;
	/** Newest first. */
	findByCustomerId(storeId: string, customerId: string, page: PageRequest): Promise<Order[]>;
	/** Newest first, optionally narrowed to one status. */
	list(storeId: string, query: OrderListQuery): Promise<Order[]>;
	/** Statuses without orders are left out. */
	countByStatus(storeId: string): Promise<Partial<Record<OrderStatus, number>>>;
	/** Inserts the order header and its items. */
	save(order: Order): Promise<void>;
	/**
	 * Persists header changes when the stored version still matches the order's,
	 * then bumps the version. Throws ConcurrentModificationError otherwise.
	 */
	update(order: Order): Promise<void>;
}
