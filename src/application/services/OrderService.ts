import { type Order, OrderStatus } from "@/domain/entities/Order";
import type { Refund } from "@/domain/entities/Refund";
import type {
	CreateOrderFromCartCommand,
	OrderFulfillmentSaga,
} from "../order/OrderFulfillmentSaga";
import type { OrderListQuery, PageRequest } from "@/domain/repositories/OrderRepository";
import type { CancelOrderUseCase } from "../use-cases/CancelOrderUseCase";
import type {
	CountOrdersByStatusUseCase,
	OrderStatusCounts,
} from "../use-cases/CountOrdersByStatusUseCase";
import type { CreateRefundUseCase } from "../use-cases/CreateRefundUseCase";
import type { GetOrderByIdUseCase } from "../use-cases/GetOrderByIdUseCase";
import type { GetOrderByNumberUseCase } from "../use-cases/GetOrderByNumberUseCase";
import type { GetOrderRefundsUseCase } from "../use-cases/GetOrderRefundsUseCase";
import type { GetOrdersByCustomerIdUseCase } from "../use-cases/GetOrdersByCustomerIdUseCase";
import type { GetRefundByIdUseCase } from "../use-cases/GetRefundByIdUseCase";
import type { ListOrdersUseCase } from "../use-cases/ListOrdersUseCase";
import type { ProcessRefundUseCase } from "../use-cases/ProcessRefundUseCase";
import type { UpdateOrderStatusUseCase } from "../use-cases/UpdateOrderStatusUseCase";
import type { RefundRequest } from "./RefundCalculator";

export class OrderService {
	constructor(
		private readonly orderFulfillmentSaga: OrderFulfillmentSaga,
		private readonly getOrderByIdUseCase: GetOrderByIdUseCase,
		private readonly getOrderByNumberUseCase: GetOrderByNumberUseCase,
		private readonly getOrdersByCustomerIdUseCase: GetOrdersByCustomerIdUseCase,
		private readonly listOrdersUseCase: ListOrdersUseCase,
		private readonly countOrdersByStatusUseCase: CountOrdersByStatusUseCase,
		private readonly updateOrderStatusUseCase: UpdateOrderStatusUseCase,
		private readonly cancelOrderUseCase: CancelOrderUseCase,
		private readonly createRefundUseCase: CreateRefundUseCase,
		private readonly processRefundUseCase: ProcessRefundUseCase,
		private readonly getOrderRefundsUseCase: GetOrderRefundsUseCase,
		private readonly getRefundByIdUseCase: GetRefundByIdUseCase
	) {}

	public async createOrderFromCart(command: CreateOrderFromCartCommand): Promise<Order> {
		return this.orderFulfillmentSaga.createOrderFromCart(command);
	}

	public async getOrderById(storeId: string, id: string): Promise<Order> {
		return this.getOrderByIdUseCase.execute(storeId, id);
	}

	public async getOrderByNumber(storeId: string, orderNumber: string): Promise<Order> {
		return this.getOrderByNumberUseCase.execute(storeId, orderNumber);
	}

	public async getOrdersByCustomer(
		storeId: string,
		customerId: string,
		page?: Partial<PageRequest>
	): Promise<Order[]> {
		return this.getOrdersByCustomerIdUseCase.execute(storeId, customerId, page);
	}

	public async listOrders(storeId: string, query?: Partial<OrderListQuery>): Promise<Order[]> {
		return this.listOrdersUseCase.execute(storeId, query);
	}

	public async countOrdersByStatus(storeId: string): Promise<OrderStatusCounts> {
		return this.countOrdersByStatusUseCase.execute(storeId);
	}

	public async updateStatus(
		storeId: string,
		orderId: string,
		newStatus: OrderStatus
	): Promise<Order> {
		return this.updateOrderStatusUseCase.execute(storeId, orderId, newStatus);
	}

	public async cancel(
		storeId: string,
		orderId: string,
		reason: string,
		actor?: string
	): Promise<Order> {
		return this.cancelOrderUseCase.execute(storeId, orderId, reason, actor);
	}

	public async markShipped(storeId: string, orderId: string, when?: Date): Promise<Order> {
		return this.updateOrderStatusUseCase.execute(
			storeId,
			orderId,
			OrderStatus.SHIPPED,
			when
		);
	}

	public async markDelivered(storeId: string, orderId: string, when?: Date): Promise<Order> {
		return this.updateOrderStatusUseCase.execute(
			storeId,
			orderId,
			OrderStatus.DELIVERED,
			when
		);
	}

	public async createRefund(
		storeId: string,
		orderId: string,
		request: RefundRequest
	): Promise<Refund> {
		return this.createRefundUseCase.execute(storeId, orderId, request);
	}

	public async processRefund(
		storeId: string,
		refundId: string,
		processedAmount: number,
		notes?: string | null
	): Promise<Refund> {
		return this.processRefundUseCase.execute(storeId, refundId, processedAmount, notes);
	}

	public async getOrderRefunds(storeId: string, orderId: string): Promise<Refund[]> {
		return this.getOrderRefundsUseCase.execute(storeId, orderId);
	}

	public async findRefund(storeId: string, refundId: string): Promise<Refund> {
		return this.getRefundByIdUseCase.execute(storeId, refundId);
	}
}
