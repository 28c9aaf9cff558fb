import type { Order } from "@/domain/entities/Order";
import { NotFoundError } from "@/domain/errors/DomainError";
import type { OrderRepository } from "@/domain/repositories/OrderRepository";
import type { TransactionManager } from "../ports/TransactionManager";

export class GetOrderByIdUseCase {
	constructor(
		private readonly orderRepository: OrderRepository,
		private readonly transactionManager: TransactionManager
	) {}

	async execute(storeId: string, id: string): Promise<Order> {
		const order = await this.transactionManager.runInSession(async () => {
			return this.orderRepository.findById(storeId, id);
		});

		if (!order) {
			throw new NotFoundError("Order", id);
		}

		return order;
	}
}
