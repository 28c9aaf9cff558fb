import { type Order, OrderStatus } from "@/domain/entities/Order";
import { NotFoundError } from "@/domain/errors/DomainError";
import type { OrderRepository } from "@/domain/repositories/OrderRepository";
import type { TransactionManager } from "../ports/TransactionManager";
import type { OutboxEventRecorder } from "../services/OutboxEventRecorder";
import type { CancelOrderUseCase } from "./CancelOrderUseCase";

export const STATUS_UPDATE_CANCEL_REASON = "Status update";

export class UpdateOrderStatusUseCase {
	constructor(
		private readonly orderRepository: OrderRepository,
		private readonly transactionManager: TransactionManager,
		private readonly outboxEventRecorder: OutboxEventRecorder,
		private readonly cancelOrderUseCase: CancelOrderUseCase
	) {}

	/** `when` stamps shipped/delivered dates; it defaults to now. */
	async execute(
		storeId: string,
		orderId: string,
		newStatus: OrderStatus,
		when?: Date
	): Promise<Order> {
		if (newStatus === OrderStatus.CANCELLED) {
			return this.cancelOrderUseCase.execute(storeId, orderId, STATUS_UPDATE_CANCEL_REASON);
		}

		return this.transactionManager.runInTransaction(async () => {
			const order = await this.orderRepository.findById(storeId, orderId, {
				forUpdate: true,
			});
			if (!order) {
				throw new NotFoundError("Order", orderId);
			}

			const previousStatus = order.getStatus();
			if (!order.transitionTo(newStatus, when ?? new Date())) {
				return order;
			}

			await this.orderRepository.update(order);
			await this.outboxEventRecorder.record(order.pullDomainEvents());

			console.log(
				`[Orders] ${order.getOrderNumber()}: ${previousStatus} -> ${order.getStatus()}`
			);
			return order;
		});
	}
}
