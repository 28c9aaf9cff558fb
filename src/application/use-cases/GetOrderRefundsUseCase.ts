import type { Refund } from "@/domain/entities/Refund";
import { NotFoundError } from "@/domain/errors/DomainError";
import type { OrderRepository } from "@/domain/repositories/OrderRepository";
import type { RefundRepository } from "@/domain/repositories/RefundRepository";
import type { TransactionManager } from "../ports/TransactionManager";

export class GetOrderRefundsUseCase {
	constructor(
		private readonly orderRepository: OrderRepository,
		private readonly refundRepository: RefundRepository,
		private readonly transactionManager: TransactionManager
	) {}

	async execute(storeId: string, orderId: string): Promise<Refund[]> {
		return this.transactionManager.runInSession(async () => {
			const order = await this.orderRepository.findById(storeId, orderId);
			if (!order) {
				throw new NotFoundError("Order", orderId);
			}
			return this.refundRepository.findByOrderId(storeId, orderId);
		});
	}
}
