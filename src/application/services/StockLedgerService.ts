import {
	AdjustmentType,
	InventoryAdjustment,
} from "@/domain/entities/InventoryAdjustment";
import type { ProductStock, QuantityChange } from "@/domain/entities/ProductStock";
import { InsufficientStockError, NotFoundError } from "@/domain/errors/DomainError";
import {
	type LowStockAlert,
	type LowStockAlertQuery,
	rankLowStockAlerts,
	toLowStockAlert,
} from "@/domain/lowStockAlerts";
import type { InventoryAdjustmentRepository } from "@/domain/repositories/InventoryAdjustmentRepository";
import type { ProductStockRepository } from "@/domain/repositories/ProductStockRepository";
import type { StockReservationRepository } from "@/domain/repositories/StockReservationRepository";
import type { StockLockManager } from "../ports/StockLockManager";
import type { TransactionManager } from "../ports/TransactionManager";
import type { OutboxEventRecorder } from "./OutboxEventRecorder";

export interface AdjustmentRequest {
	productId: string;
	type: AdjustmentType;
	quantity: number;
	reason: string;
	reference?: string | null;
	notes?: string | null;
}

export interface ReservedDecrement {
	productId: string;
	quantity: number;
	reason: string;
	reference: string;
}

export interface BulkStockUpdate {
	productId: string;
	quantity: number;
	lowStockThreshold?: number;
}

export interface AdjustmentResult {
	stock: ProductStock;
	adjustment: InventoryAdjustment;
}

export const BULK_UPDATE_REASON = "Bulk inventory update";

/**
 * Sole writer of product quantities. Each change locks the product row, applies
 * the new quantity and appends its audit row in one transaction. A change that
 * lowers a quantity never goes below what live reservations hold.
 */
export class StockLedgerService {
	constructor(
		private readonly productStockRepository: ProductStockRepository,
		private readonly adjustmentRepository: InventoryAdjustmentRepository,
		private readonly reservationRepository: StockReservationRepository,
		private readonly stockLockManager: StockLockManager,
		private readonly transactionManager: TransactionManager,
		private readonly outboxEventRecorder: OutboxEventRecorder
	) {}

	async getStock(storeId: string, productId: string): Promise<ProductStock | null> {
		return this.transactionManager.runInSession(() =>
			this.productStockRepository.findById(storeId, productId)
		);
	}

	async hasSufficientStock(
		storeId: string,
		productId: string,
		quantity: number
	): Promise<boolean> {
		const stock = await this.getStock(storeId, productId);
		if (!stock) return false;
		return stock.hasSufficientStock(quantity);
	}

	async recordAdjustment(
		storeId: string,
		request: AdjustmentRequest,
		actor = "system"
	): Promise<AdjustmentResult> {
		const adjust = () =>
			this.transactionManager.runInTransaction(() =>
				this.adjustLocked(storeId, request, actor)
			);

		// Same lease as checkout, so a hold cannot slip in between check and write.
		if (request.type === AdjustmentType.INCREASE) return adjust();
		return this.stockLockManager.withProductLocks(storeId, [request.productId], adjust);
	}

	/**
	 * Decrement for a reservation the caller has just confirmed, in the caller's
	 * transaction. Takes no product lease: the hold already covered the quantity.
	 */
	async consumeReservation(
		storeId: string,
		decrement: ReservedDecrement,
		actor = "system"
	): Promise<AdjustmentResult> {
		return this.transactionManager.runInTransaction(() =>
			this.adjustLocked(storeId, { ...decrement, type: AdjustmentType.DECREASE }, actor)
		);
	}

	/** All-or-nothing: the first failing entry rolls back the whole batch. */
	async bulkUpdate(
		storeId: string,
		updates: BulkStockUpdate[],
		actor = "system"
	): Promise<AdjustmentResult[]> {
		const productIds = updates.map((update) => update.productId);
		return this.stockLockManager.withProductLocks(storeId, productIds, () =>
			this.applyBulk(storeId, updates, actor)
		);
	}

	private async applyBulk(
		storeId: string,
		updates: BulkStockUpdate[],
		actor: string
	): Promise<AdjustmentResult[]> {
		return this.transactionManager.runInTransaction(async () => {
			const results: AdjustmentResult[] = [];

			for (const update of updates) {
				const result = await this.adjustLocked(
					storeId,
					{
						productId: update.productId,
						type: AdjustmentType.SET,
						quantity: update.quantity,
						reason: BULK_UPDATE_REASON,
					},
					actor,
					update.lowStockThreshold
				);
				results.push(result);
			}

			console.log(
				`[StockLedger] Bulk update applied ${results.length} change(s) in store ${storeId}`
			);
			return results;
		});
	}

	async getAdjustmentHistory(
		storeId: string,
		productId: string,
		limit = 50
	): Promise<InventoryAdjustment[]> {
		return this.transactionManager.runInSession(() =>
			this.adjustmentRepository.findByProductId(storeId, productId, limit)
		);
	}

	async getLowStockAlerts(
		storeId: string,
		query: LowStockAlertQuery = {}
	): Promise<LowStockAlert[]> {
		const stocks = await this.transactionManager.runInSession(() =>
			this.productStockRepository.findLowStock(storeId)
		);
		return rankLowStockAlerts(stocks.map(toLowStockAlert), query);
	}

	private async adjustLocked(
		storeId: string,
		request: AdjustmentRequest,
		actor: string,
		lowStockThreshold?: number
	): Promise<AdjustmentResult> {
		const now = new Date();
		const stock = await this.productStockRepository.findById(storeId, request.productId, {
			forUpdate: true,
		});
		if (!stock) {
			throw new NotFoundError("Product", request.productId);
		}

		if (lowStockThreshold !== undefined) {
			stock.changeLowStockThreshold(lowStockThreshold);
		}

		const change = stock.applyAdjustment(request.type, request.quantity, now);
		if (change.newQuantity < change.previousQuantity) {
			await this.assertHoldsCovered(storeId, request.productId, change, now);
		}
		const adjustment = InventoryAdjustment.record({
			storeId,
			productId: request.productId,
			type: request.type,
			quantity: request.quantity,
			previousQuantity: change.previousQuantity,
			newQuantity: change.newQuantity,
			reason: request.reason,
			reference: request.reference ?? null,
			notes: request.notes ?? null,
			adjustedBy: actor,
			adjustedAt: now,
		});

		await this.productStockRepository.update(stock);
		await this.adjustmentRepository.append(adjustment);
		await this.outboxEventRecorder.record(stock.pullDomainEvents());

		console.log(
			`[StockLedger] ${request.type} ${request.productId}: ${change.previousQuantity} -> ${change.newQuantity} (${request.reason})`
		);

		return { stock, adjustment };
	}

	private async assertHoldsCovered(
		storeId: string,
		productId: string,
		change: QuantityChange,
		now: Date
	): Promise<void> {
		const reserved = await this.reservationRepository.totalReserved(storeId, productId, now);
		if (change.newQuantity < reserved) {
			throw new InsufficientStockError(
				productId,
				change.previousQuantity - change.newQuantity,
				Math.max(change.previousQuantity - reserved, 0)
			);
		}
	}
}
