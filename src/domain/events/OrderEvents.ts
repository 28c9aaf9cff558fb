import type { Order, OrderStatus } from "../entities/Order";
import type {
	OrderCancelledEvent,
	OrderCreatedEvent,
	OrderDeliveredEvent,
	OrderShippedEvent,
	OrderStatusChangedEvent,
} from "./DomainEvents";

export class OrderEvents {
	static created(order: Order): OrderCreatedEvent {
		const totals = order.getTotals();
		return {
			type: "ORDER_CREATED",
			timestamp: order.getOrderDate(),
			storeId: order.getStoreId(),
			aggregateId: order.getId(),
			aggregateType: "Order",
			data: {
				orderId: order.getId(),
				orderNumber: order.getOrderNumber(),
				customerId: order.getCustomerId(),
				items: order.getItems().map((item) => ({
					productId: item.getProductId(),
					productName: item.getProductName(),
					productSku: item.getProductSku(),
					quantity: item.getQuantity(),
					unitPrice: item.getUnitPrice(),
					totalPrice: item.getTotalPrice(),
				})),
				subtotal: totals.subtotal,
				taxAmount: totals.taxAmount,
				shippingAmount: totals.shippingAmount,
				discountAmount: totals.discountAmount,
				totalAmount: totals.totalAmount,
				currency: order.getCurrency(),
			},
		};
	}

	static statusChanged(
		order: Order,
		previousStatus: OrderStatus,
		changedAt: Date
	): OrderStatusChangedEvent {
		return {
			type: "ORDER_STATUS_CHANGED",
			timestamp: changedAt,
			storeId: order.getStoreId(),
			aggregateId: order.getId(),
			aggregateType: "Order",
			data: {
				orderId: order.getId(),
				orderNumber: order.getOrderNumber(),
				previousStatus,
				newStatus: order.getStatus(),
				changedAt,
			},
		};
	}

	static shipped(order: Order): OrderShippedEvent {
		const shippedAt = order.getShippedDate() ?? new Date();
		return {
			type: "ORDER_SHIPPED",
			timestamp: shippedAt,
			storeId: order.getStoreId(),
			aggregateId: order.getId(),
			aggregateType: "Order",
			data: {
				orderId: order.getId(),
				orderNumber: order.getOrderNumber(),
				customerId: order.getCustomerId(),
				shippedAt,
			},
		};
	}

	static delivered(order: Order): OrderDeliveredEvent {
		const deliveredAt = order.getDeliveredDate() ?? new Date();
		return {
			type: "ORDER_DELIVERED",
			timestamp: deliveredAt,
			storeId: order.getStoreId(),
			aggregateId: order.getId(),
			aggregateType: "Order",
			data: {
				orderId: order.getId(),
				orderNumber: order.getOrderNumber(),
				customerId: order.getCustomerId(),
				deliveredAt,
			},
		};
	}

	static cancelled(
		order: Order,
		previousStatus: OrderStatus,
		cancelledAt: Date
	): OrderCancelledEvent {
		return {
			type: "ORDER_CANCELLED",
			timestamp: cancelledAt,
			storeId: order.getStoreId(),
			aggregateId: order.getId(),
			aggregateType: "Order",
			data: {
				orderId: order.getId(),
				orderNumber: order.getOrderNumber(),
				customerId: order.getCustomerId(),
				previousStatus,
				reason: order.getCancellationReason() ?? "",
				cancelledAt,
				totalAmount: order.getTotalAmount(),
				currency: order.getCurrency(),
			},
		};
	}
}
