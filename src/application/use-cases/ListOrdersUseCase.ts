import type { Order } from "@/domain/entities/Order";
import type { OrderListQuery, OrderRepository } from "@/domain/repositories/OrderRepository";
import type { TransactionManager } from "../ports/TransactionManager";
import { DEFAULT_ORDER_PAGE } from "./GetOrdersByCustomerIdUseCase";

export class ListOrdersUseCase {
	constructor(
		private readonly orderRepository: OrderRepository,
		private readonly transactionManager: TransactionManager
	) {}

	async execute(storeId: string, query: Partial<OrderListQuery> = {}): Promise<Order[]> {
		return this.transactionManager.runInSession(async () => {
			return this.orderRepository.list(storeId, {
				page: query.page ?? DEFAULT_ORDER_PAGE.page,
				size: query.size ?? DEFAULT_ORDER_PAGE.size,
				status: query.status,
			});
		});
	}
}
