export interface DomainEvent<
	TData = unknown,
	TAggregate extends string = string,
	TType extends string = string,
> {
	type: TType;
	timestamp: Date;
	storeId: string;
	aggregateId: string;
	aggregateType: TAggregate;
	data: TData;
}

export interface OrderLinePayload {
	productId: string;
	productName: string;
	productSku: string | null;
	quantity: number;
	unitPrice: number;
	totalPrice: number;
}

export interface OrderCreatedPayload {
	orderId: string;
	orderNumber: string;
	customerId: string;
	items: OrderLinePayload[];
	subtotal: number;
	taxAmount: number;
	shippingAmount: number;
	discountAmount: number;
	totalAmount: number;
	currency: string;
}

export interface OrderStatusChangedPayload {
	orderId: string;
	orderNumber: string;
	previousStatus: string;
	newStatus: string;
	changedAt: Date;
}

export interface OrderShippedPayload {
	orderId: string;
	orderNumber: string;
	customerId: string;
	shippedAt: Date;
}

export interface OrderDeliveredPayload {
	orderId: string;
	orderNumber: string;
	customerId: string;
	deliveredAt: Date;
}

export interface OrderCancelledPayload {
	orderId: string;
	orderNumber: string;
	customerId: string;
	previousStatus: string;
	reason: string;
	cancelledAt: Date;
	totalAmount: number;
	currency: string;
}

export interface RefundRequestedPayload {
	refundId: string;
	refundNumber: string;
	orderId: string;
	orderNumber: string;
	type: string;
	amount: number;
	refundMethod: string | null;
	reason: string;
}

export interface RefundProcessedPayload {
	refundId: string;
	refundNumber: string;
	orderId: string;
	orderNumber: string;
	processedAmount: number;
	processedAt: Date;
}

export interface InventoryLowStockPayload {
	productId: string;
	quantity: number;
	lowStockThreshold: number;
}

export type OrderCreatedEvent = DomainEvent<OrderCreatedPayload, "Order", "ORDER_CREATED">;

export type OrderStatusChangedEvent = DomainEvent<
	OrderStatusChangedPayload,
	"Order",
	"ORDER_STATUS_CHANGED"
>;

export type OrderShippedEvent = DomainEvent<OrderShippedPayload, "Order", "ORDER_SHIPPED">;

export type OrderDeliveredEvent = DomainEvent<
	OrderDeliveredPayload,
	"Order",
	"ORDER_DELIVERED"
>;

export type OrderCancelledEvent = DomainEvent<
	OrderCancelledPayload,
	"Order",
	"ORDER_CANCELLED"
>;

export type RefundRequestedEvent = DomainEvent<
	RefundRequestedPayload,
	"Refund",
	"REFUND_REQUESTED"
>;

export type RefundProcessedEvent = DomainEvent<
	RefundProcessedPayload,
	"Refund",
	"REFUND_PROCESSED"
>;

export type InventoryLowStockEvent = DomainEvent<
	InventoryLowStockPayload,
	"Product",
	"INVENTORY_LOW_STOCK"
>;

export type OrderDomainEvent =
	| OrderCreatedEvent
	| OrderStatusChangedEvent
	| OrderShippedEvent
	| OrderDeliveredEvent
	| OrderCancelledEvent;

export type RefundDomainEvent = RefundRequestedEvent | RefundProcessedEvent;

export type InventoryDomainEvent = InventoryLowStockEvent;

export type FulfillmentDomainEvent =
	| OrderDomainEvent
	| RefundDomainEvent
	| InventoryDomainEvent;
