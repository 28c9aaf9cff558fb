import { AdjustmentType } from "@/domain/entities/InventoryAdjustment";
import type { Order } from "@/domain/entities/Order";
import { NotFoundError } from "@/domain/errors/DomainError";
import type { InventoryAdjustmentRepository } from "@/domain/repositories/InventoryAdjustmentRepository";
import type { OrderRepository } from "@/domain/repositories/OrderRepository";
import type { TransactionManager } from "../ports/TransactionManager";
import type { OutboxEventRecorder } from "../services/OutboxEventRecorder";
import type { ReservationService } from "../services/ReservationService";
import type { StockLedgerService } from "../services/StockLedgerService";

export class CancelOrderUseCase {
	constructor(
		private readonly orderRepository: OrderRepository,
		private readonly adjustmentRepository: InventoryAdjustmentRepository,
		private readonly stockLedger: StockLedgerService,
		private readonly reservationService: ReservationService,
		private readonly transactionManager: TransactionManager,
		private readonly outboxEventRecorder: OutboxEventRecorder
	) {}

	/**
	 * Cancels the order, puts back the stock its creation took and releases the
	 * holds it never confirmed, all in one transaction. Cancelling a cancelled
	 * order changes nothing.
	 */
	async execute(
		storeId: string,
		orderId: string,
		reason: string,
		actor = "system"
	): Promise<Order> {
		return this.transactionManager.runInTransaction(async () => {
			const order = await this.orderRepository.findById(storeId, orderId, {
				forUpdate: true,
			});
			if (!order) {
				throw new NotFoundError("Order", orderId);
			}

			if (!order.cancel(reason)) {
				return order;
			}

			await this.restoreInventory(order, actor);
			await this.reservationService.releaseForOrder(storeId, order.getOrderNumber());
			await this.orderRepository.update(order);
			await this.outboxEventRecorder.record(order.pullDomainEvents());

			console.log(`[Orders] Cancelled order ${order.getOrderNumber()}: ${reason}`);
			return order;
		});
	}

	private async restoreInventory(order: Order, actor: string): Promise<void> {
		const storeId = order.getStoreId();
		const orderNumber = order.getOrderNumber();
		const decremented = await this.decrementedByProduct(storeId, orderNumber);

		for (const item of order.getItems()) {
			const productId = item.getProductId();
			const stock = await this.stockLedger.getStock(storeId, productId);

			if (!stock || !stock.isTrackingInventory()) {
				console.warn(
					`[Orders] Skipping stock restore for ${productId} on ${orderNumber}: product missing or not tracked`
				);
				continue;
			}

			const taken = decremented.get(productId) ?? 0;
			const quantity = Math.min(item.getQuantity(), taken);
			if (quantity <= 0) {
				console.warn(
					`[Orders] Skipping stock restore for ${productId} on ${orderNumber}: no confirmed decrement`
				);
				continue;
			}
			decremented.set(productId, taken - quantity);

			await this.stockLedger.recordAdjustment(
				storeId,
				{
					productId,
					type: AdjustmentType.INCREASE,
					quantity,
					reason: `Order cancellation: ${orderNumber}`,
					reference: orderNumber,
				},
				actor
			);
		}
	}

	private async decrementedByProduct(
		storeId: string,
		orderNumber: string
	): Promise<Map<string, number>> {
		const adjustments = await this.adjustmentRepository.findByReference(storeId, orderNumber);
		const totals = new Map<string, number>();

		for (const adjustment of adjustments) {
			if (adjustment.getType() !== AdjustmentType.DECREASE) continue;
			const productId = adjustment.getProductId();
			totals.set(productId, (totals.get(productId) ?? 0) + adjustment.getQuantity());
		}

		return totals;
	}
}
