import type { InventoryAdjustment } from "@/domain/entities/InventoryAdjustment";
import type { AddressSnapshot, Order, OrderStatus } from "@/domain/entities/Order";
import type { ProductStock } from "@/domain/entities/ProductStock";
import type { Refund, RefundStatus, RefundType } from "@/domain/entities/Refund";
import type { LowStockAlert, StockUrgency } from "@/domain/lowStockAlerts";

export interface GetOrderHttpResponse {
	id: string;
	store_id: string;
	order_number: string;
	customer_id: string;
	status: OrderStatus;
	currency: string;
	items: {
		id: string;
		product_id: string;
		product_name: string;
		product_sku: string | null;
		quantity: number;
		unit_price: number;
		total_price: number;
	}[];
	subtotal: number;
	tax_amount: number;
	shipping_amount: number;
	discount_amount: number;
	total_amount: number;
	shipping_address: AddressSnapshot;
	billing_address: AddressSnapshot;
	notes: string | null;
	cancellation_reason: string | null;
	order_date: string;
	shipped_date: string | null;
	delivered_date: string | null;
	version: number;
}

export interface GetRefundHttpResponse {
	id: string;
	refund_number: string;
	order_id: string;
	order_number: string;
	type: RefundType;
	status: RefundStatus;
	amount: number;
	processed_amount: number | null;
	reason: string;
	refund_method: string | null;
	notes: string | null;
	items: {
		order_item_id: string;
		product_id: string;
		quantity: number;
		unit_price: number;
		amount: number;
	}[];
	requested_at: string;
	processed_at: string | null;
}

export interface GetStockHttpResponse {
	product_id: string;
	name: string;
	sku: string | null;
	quantity: number;
	low_stock_threshold: number;
	track_inventory: boolean;
	low_stock: boolean;
}

export interface GetLowStockAlertHttpResponse {
	product_id: string;
	product_name: string;
	sku: string | null;
	current_stock: number;
	low_stock_threshold: number;
	stock_percentage: number;
	urgency: StockUrgency;
}

export interface GetAdjustmentHttpResponse {
	id: string;
	product_id: string;
	type: string;
	quantity: number;
	previous_quantity: number;
	new_quantity: number;
	reason: string;
	reference: string | null;
	notes: string | null;
	adjusted_by: string;
	adjusted_at: string;
}

const isoOrNull = (date: Date | null): string | null => (date ? date.toISOString() : null);

export const toOrderHttpResponse = (order: Order): GetOrderHttpResponse => {
	const totals = order.getTotals();

	return {
		id: order.getId(),
		store_id: order.getStoreId(),
		order_number: order.getOrderNumber(),
		customer_id: order.getCustomerId(),
		status: order.getStatus(),
		currency: order.getCurrency(),
		items: order.getItems().map((item) => ({
			id: item.getId(),
			product_id: item.getProductId(),
			product_name: item.getProductName(),
			product_sku: item.getProductSku(),
			quantity: item.getQuantity(),
			unit_price: item.getUnitPrice(),
			total_price: item.getTotalPrice(),
		})),
		subtotal: totals.subtotal,
		tax_amount: totals.taxAmount,
		shipping_amount: totals.shippingAmount,
		discount_amount: totals.discountAmount,
		total_amount: totals.totalAmount,
		shipping_address: order.getShippingAddress(),
		billing_address: order.getBillingAddress(),
		notes: order.getNotes(),
		cancellation_reason: order.getCancellationReason(),
		order_date: order.getOrderDate().toISOString(),
		shipped_date: isoOrNull(order.getShippedDate()),
		delivered_date: isoOrNull(order.getDeliveredDate()),
		version: order.getVersion(),
	};
};

export const toRefundHttpResponse = (refund: Refund): GetRefundHttpResponse => ({
	id: refund.getId(),
	refund_number: refund.getRefundNumber(),
	order_id: refund.getOrderId(),
	order_number: refund.getOrderNumber(),
	type: refund.getType(),
	status: refund.getStatus(),
	amount: refund.getAmount(),
	processed_amount: refund.getProcessedAmount(),
	reason: refund.getReason(),
	refund_method: refund.getRefundMethod(),
	notes: refund.getNotes(),
	items: refund.getItems().map((item) => ({
		order_item_id: item.orderItemId,
		product_id: item.productId,
		quantity: item.quantity,
		unit_price: item.unitPrice,
		amount: item.amount,
	})),
	requested_at: refund.getRequestedAt().toISOString(),
	processed_at: isoOrNull(refund.getProcessedAt()),
});

export const toStockHttpResponse = (stock: ProductStock): GetStockHttpResponse => ({
	product_id: stock.getId(),
	name: stock.getName(),
	sku: stock.getSku(),
	quantity: stock.getQuantity(),
	low_stock_threshold: stock.getLowStockThreshold(),
	track_inventory: stock.isTrackingInventory(),
	low_stock: stock.isLowStock(),
});

export const toAdjustmentHttpResponse = (
	adjustment: InventoryAdjustment
): GetAdjustmentHttpResponse => ({
	id: adjustment.getId(),
	product_id: adjustment.getProductId(),
	type: adjustment.getType(),
	quantity: adjustment.getQuantity(),
	previous_quantity: adjustment.getPreviousQuantity(),
	new_quantity: adjustment.getNewQuantity(),
	reason: adjustment.getReason(),
	reference: adjustment.getReference(),
	notes: adjustment.getNotes(),
	adjusted_by: adjustment.getAdjustedBy(),
	adjusted_at: adjustment.getAdjustedAt().toISOString(),
});

export const toLowStockAlertHttpResponse = (alert: LowStockAlert): GetLowStockAlertHttpResponse => ({
	product_id: alert.productId,
	product_name: alert.productName,
	sku: alert.sku,
	current_stock: alert.currentStock,
	low_stock_threshold: alert.lowStockThreshold,
	stock_percentage: alert.stockPercentage,
	urgency: alert.urgency,
});
