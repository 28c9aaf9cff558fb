import type { Refund } from "../entities/Refund";
import type { RefundProcessedEvent, RefundRequestedEvent } from "./DomainEvents";

export class RefundEvents {
	static requested(refund: Refund): RefundRequestedEvent {
		return {
			type: "REFUND_REQUESTED",
			timestamp: refund.getRequestedAt(),
			storeId: refund.getStoreId(),
			aggregateId: refund.getId(),
			aggregateType: "Refund",
			data: {
				refundId: refund.getId(),
				refundNumber: refund.getRefundNumber(),
				orderId: refund.getOrderId(),
				orderNumber: refund.getOrderNumber(),
				type: refund.getType(),
				amount: refund.getAmount(),
				refundMethod: refund.getRefundMethod(),
				reason: refund.getReason(),
			},
		};
	}

	static processed(refund: Refund, processedAt: Date): RefundProcessedEvent {
		return {
			type: "REFUND_PROCESSED",
			timestamp: processedAt,
			storeId: refund.getStoreId(),
			aggregateId: refund.getId(),
			aggregateType: "Refund",
			data: {
				refundId: refund.getId(),
				refundNumber: refund.getRefundNumber(),
				orderId: refund.getOrderId(),
				orderNumber: refund.getOrderNumber(),
				processedAmount: refund.getProcessedAmount() ?? 0,
				processedAt,
			},
		};
	}
}
