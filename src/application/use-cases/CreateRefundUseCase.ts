import { Refund } from "@/domain/entities/Refund";
import { NotFoundError } from "@/domain/errors/DomainError";
import type { OrderRepository } from "@/domain/repositories/OrderRepository";
import type { RefundRepository } from "@/domain/repositories/RefundRepository";
import type { TransactionManager } from "../ports/TransactionManager";
import type { OutboxEventRecorder } from "../services/OutboxEventRecorder";
import type { RefundCalculator, RefundRequest } from "../services/RefundCalculator";

export class CreateRefundUseCase {
	constructor(
		private readonly orderRepository: OrderRepository,
		private readonly refundRepository: RefundRepository,
		private readonly refundCalculator: RefundCalculator,
		private readonly transactionManager: TransactionManager,
		private readonly outboxEventRecorder: OutboxEventRecorder
	) {}

	async execute(storeId: string, orderId: string, request: RefundRequest): Promise<Refund> {
		return this.transactionManager.runInTransaction(async () => {
			// The order row lock serializes refunds against the same order.
			const order = await this.orderRepository.findById(storeId, orderId, {
				forUpdate: true,
			});
			if (!order) {
				throw new NotFoundError("Order", orderId);
			}

			const alreadyRefunded = await this.refundRepository.sumAmountByOrderId(
				storeId,
				orderId
			);
			const calculation = this.refundCalculator.calculate(order, request, alreadyRefunded);

			const refund = Refund.request({
				storeId,
				orderId,
				orderNumber: order.getOrderNumber(),
				type: request.type,
				amount: calculation.amount,
				reason: request.reason,
				refundMethod: request.refundMethod,
				notes: request.notes,
				items: calculation.items,
			});

			await this.refundRepository.save(refund);
			await this.outboxEventRecorder.record(refund.pullDomainEvents());

			console.log(
				`[Refunds] ${refund.getRefundNumber()} requested for ${order.getOrderNumber()}: ${calculation.amount} of ${calculation.remainingBefore} remaining`
			);
			return refund;
		});
	}
}
