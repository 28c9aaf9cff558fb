/**
 * Row store shared by the in-memory repositories. Rows are plain props so a
 * transaction can snapshot and restore the whole store with structuredClone.
 */
import { AsyncLocalStorage } from "node:async_hooks";
import type { CartStatus } from "@/application/ports/CartProvider";
import type { StockLockManager } from "@/application/ports/StockLockManager";
import type { TransactionManager } from "@/application/ports/TransactionManager";
import type { InventoryAdjustmentProps } from "@/domain/entities/InventoryAdjustment";
import type { OrderProps } from "@/domain/entities/Order";
import type { OrderItemProps } from "@/domain/entities/OrderItem";
import type { OutboxProps } from "@/domain/entities/Outbox";
import type { ProductStockProps } from "@/domain/entities/ProductStock";
import type { RefundProps } from "@/domain/entities/Refund";
import type { StockReservationProps } from "@/domain/entities/StockReservation";

/** Product rows also carry the catalog price the stock ledger never reads. */
export type ProductRow = ProductStockProps & { price: number };

export type OrderRow = Omit<OrderProps, "items"> & { items: OrderItemProps[] };

export interface AdjustmentRow {
	id: string;
	props: InventoryAdjustmentProps;
}

export interface CartRow {
	id: string;
	storeId: string;
	customerId: string;
	status: CartStatus;
	expiresAt: Date | null;
	items: { productId: string; quantity: number; unitPrice: number }[];
}

export interface Tables {
	products: Map<string, ProductRow>;
	orders: Map<string, OrderRow>;
	reservations: Map<string, StockReservationProps>;
	adjustments: AdjustmentRow[];
	refunds: Map<string, RefundProps>;
	outbox: Map<string, OutboxProps>;
	carts: Map<string, CartRow>;
}

export const rowKey = (storeId: string, id: string): string => `${storeId}:${id}`;

const emptyTables = (): Tables => ({
	products: new Map(),
	orders: new Map(),
	reservations: new Map(),
	adjustments: [],
	refunds: new Map(),
	outbox: new Map(),
	carts: new Map(),
});

export class InMemoryDatabase {
	public tables: Tables = emptyTables();

	snapshot(): Tables {
		return structuredClone(this.tables);
	}

	restore(tables: Tables): void {
		this.tables = tables;
	}
}

/**
 * Serializes top-level transactions and rolls the store back when the work
 * throws. Nested calls join the running transaction.
 */
export class InMemoryTransactionManager implements TransactionManager {
	private readonly scope = new AsyncLocalStorage<boolean>();
	private tail: Promise<void> = Promise.resolve();
	public commits = 0;
	public rollbacks = 0;

	constructor(private readonly db: InMemoryDatabase) {}

	async runInTransaction<T>(work: () => Promise<T>): Promise<T> {
		if (this.scope.getStore()) {
			return work();
		}

		const previous = this.tail;
		let release: () => void = () => {};
		const current = new Promise<void>((resolve) => {
			release = resolve;
		});
		this.tail = previous.then(() => current);
		await previous;

		const snapshot = this.db.snapshot();
		try {
			const result = await this.scope.run(true, work);
			this.commits++;
			return result;
		} catch (error) {
			this.db.restore(snapshot);
			this.rollbacks++;
			throw error;
		} finally {
			release();
		}
	}

	async runInSession<T>(work: () => Promise<T>): Promise<T> {
		return work();
	}
}

/** Per-key promise-chain mutex; keys are taken in sorted order. */
export class InMemoryStockLockManager implements StockLockManager {
	private readonly tails = new Map<string, Promise<void>>();
	public readonly acquired: string[][] = [];

	async withProductLocks<T>(
		storeId: string,
		productIds: string[],
		work: () => Promise<T>
	): Promise<T> {
		const keys = [...new Set(productIds)].sort().map((id) => rowKey(storeId, id));
		const releases: (() => void)[] = [];

		for (const key of keys) {
			const previous = this.tails.get(key) ?? Promise.resolve();
			let release: () => void = () => {};
			const current = new Promise<void>((resolve) => {
				release = resolve;
			});
			this.tails.set(
				key,
				previous.then(() => current)
			);
			await previous;
			releases.push(release);
		}
		this.acquired.push(keys);

		try {
			return await work();
		} finally {
			for (const release of releases.reverse()) release();
		}
	}
}
