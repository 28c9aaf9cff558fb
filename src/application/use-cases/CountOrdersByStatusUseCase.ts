import { OrderStatus } from "@/domain/entities/Order";
import type { OrderRepository } from "@/domain/repositories/OrderRepository";
import type { TransactionManager } from "../ports/TransactionManager";

export type OrderStatusCounts = Record<OrderStatus, number>;

export class CountOrdersByStatusUseCase {
	constructor(
		private readonly orderRepository: OrderRepository,
		private readonly transactionManager: TransactionManager
	) {}

	/** Every status is present; those without orders count zero. */
	async execute(storeId: string): Promise<OrderStatusCounts> {
		const counts = await this.transactionManager.runInSession(async () => {
			return this.orderRepository.countByStatus(storeId);
		});

		return {
			[OrderStatus.PENDING]: counts[OrderStatus.PENDING] ?? 0,
			[OrderStatus.CONFIRMED]: counts[OrderStatus.CONFIRMED] ?? 0,
			[OrderStatus.PROCESSING]: counts[OrderStatus.PROCESSING] ?? 0,
			[OrderStatus.SHIPPED]: counts[OrderStatus.SHIPPED] ?? 0,
			[OrderStatus.DELIVERED]: counts[OrderStatus.DELIVERED] ?? 0,
			[OrderStatus.CANCELLED]: counts[OrderStatus.CANCELLED] ?? 0,
		};
	}
}
