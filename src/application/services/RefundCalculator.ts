import moment from "moment";
import { type Order, OrderStatus } from "@/domain/entities/Order";
import { type RefundItem, RefundType } from "@/domain/entities/Refund";
import { InvalidStateError, NotFoundError } from "@/domain/errors/DomainError";
import { fromCents, multiplyMoney, toCents } from "@/domain/money";

export interface RefundItemRequest {
	orderItemId: string;
	quantity: number;
}

export interface RefundRequest {
	type: RefundType;
	amount?: number | null;
	items?: RefundItemRequest[] | null;
	reason: string;
	refundMethod?: string | null;
	notes?: string | null;
}

export interface RefundCalculation {
	amount: number;
	items: RefundItem[];
	remainingBefore: number;
}

export interface RefundCalculatorOptions {
	refundWindowDays: number;
}

const REFUNDABLE_STATUSES = [OrderStatus.DELIVERED, OrderStatus.CANCELLED];

export class RefundCalculator {
	constructor(private readonly options: RefundCalculatorOptions = { refundWindowDays: 30 }) {}

	assertRefundable(order: Order, now: Date = new Date()): void {
		if (!REFUNDABLE_STATUSES.includes(order.getStatus())) {
			throw new InvalidStateError(
				`Order ${order.getOrderNumber()} cannot be refunded in status ${order.getStatus()}`
			);
		}

		const deliveredDate = order.getDeliveredDate();
		if (order.getStatus() === OrderStatus.DELIVERED && deliveredDate) {
			const windowEnd = moment
				.utc(deliveredDate)
				.add(this.options.refundWindowDays, "days");
			if (windowEnd.isBefore(now)) {
				throw new InvalidStateError(
					`Refund window of ${this.options.refundWindowDays} days has passed for order ${order.getOrderNumber()}`
				);
			}
		}
	}

	/**
	 * @param alreadyRefunded Σ of refunds recorded for the order so far.
	 */
	calculate(
		order: Order,
		request: RefundRequest,
		alreadyRefunded: number,
		now: Date = new Date()
	): RefundCalculation {
		this.assertRefundable(order, now);

		const remainingCents = toCents(order.getTotalAmount()) - toCents(alreadyRefunded);
		const items = this.resolveItems(order, request);
		const amountCents = this.requestedAmountCents(order, request, items);

		if (amountCents <= 0) {
			throw new InvalidStateError("Refund amount must be greater than zero");
		}
		if (amountCents > remainingCents) {
			throw new InvalidStateError(
				`Refund amount ${fromCents(amountCents)} exceeds remaining refundable amount ${fromCents(remainingCents)}`
			);
		}

		return {
			amount: fromCents(amountCents),
			items,
			remainingBefore: fromCents(remainingCents),
		};
	}

	private requestedAmountCents(
		order: Order,
		request: RefundRequest,
		items: RefundItem[]
	): number {
		if (request.type === RefundType.FULL) {
			return toCents(order.getTotalAmount());
		}

		if (request.amount !== undefined && request.amount !== null) {
			return toCents(request.amount);
		}

		if (items.length === 0) {
			throw new InvalidStateError("Partial refund requires an amount or items");
		}
		return items.reduce((total, item) => total + toCents(item.amount), 0);
	}

	private resolveItems(order: Order, request: RefundRequest): RefundItem[] {
		if (request.type === RefundType.FULL) {
			return order.getItems().map((item) => ({
				orderItemId: item.getId(),
				productId: item.getProductId(),
				productName: item.getProductName(),
				productSku: item.getProductSku(),
				quantity: item.getQuantity(),
				unitPrice: item.getUnitPrice(),
				amount: item.getTotalPrice(),
			}));
		}

		return (request.items ?? []).map((requested) => {
			const item = order.findItem(requested.orderItemId);
			if (!item) {
				throw new NotFoundError("Order item", requested.orderItemId);
			}
			if (
				!Number.isInteger(requested.quantity) ||
				requested.quantity <= 0 ||
				requested.quantity > item.getQuantity()
			) {
				throw new InvalidStateError(
					`Refund quantity ${requested.quantity} is invalid for order item ${item.getId()} (ordered ${item.getQuantity()})`
				);
			}

			return {
				orderItemId: item.getId(),
				productId: item.getProductId(),
				productName: item.getProductName(),
				productSku: item.getProductSku(),
				quantity: requested.quantity,
				unitPrice: item.getUnitPrice(),
				amount: multiplyMoney(item.getUnitPrice(), requested.quantity),
			};
		});
	}
}
