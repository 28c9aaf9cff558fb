import type { Order } from "@/domain/entities/Order";
import type { OrderRepository, PageRequest } from "@/domain/repositories/OrderRepository";
import type { TransactionManager } from "../ports/TransactionManager";

export const DEFAULT_ORDER_PAGE: PageRequest = { page: 0, size: 20 };

export class GetOrdersByCustomerIdUseCase {
	constructor(
		private readonly orderRepository: OrderRepository,
		private readonly transactionManager: TransactionManager
	) {}

	async execute(
		storeId: string,
		customerId: string,
		page: Partial<PageRequest> = {}
	): Promise<Order[]> {
		return this.transactionManager.runInSession(async () => {
			return this.orderRepository.findByCustomerId(storeId, customerId, {
				page: page.page ?? DEFAULT_ORDER_PAGE.page,
				size: page.size ?? DEFAULT_ORDER_PAGE.size,
			});
		});
	}
}
