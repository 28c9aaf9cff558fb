import { describe, expect, it } from "vitest";
import { RefundCalculator } from "@/application/services/RefundCalculator";
import { Order, OrderStatus } from "@/domain/entities/Order";
import { OrderItem } from "@/domain/entities/OrderItem";
import { RefundType } from "@/domain/entities/Refund";
import { InvalidStateError, NotFoundError } from "@/domain/errors/DomainError";
import { SHIPPING_ADDRESS } from "../../support/context";

const DELIVERED_AT = new Date("2025-01-01T00:00:00.000Z");
const WITHIN_WINDOW = new Date("2025-01-20T00:00:00.000Z");

const orderIn = (status: OrderStatus): Order =>
	Order.loadOrder({
		id: "order-1",
		storeId: "store-1",
		orderNumber: "ORD-20241220-0000ABCD",
		customerId: "customer-1",
		status,
		items: [
			OrderItem.loadOrderItem({
				id: "i-1",
				orderId: "order-1",
				productId: "P1",
				productName: "Mug",
				productSku: "MUG-1",
				quantity: 2,
				unitPrice: 10,
				totalPrice: 20,
			}),
			OrderItem.loadOrderItem({
				id: "i-2",
				orderId: "order-1",
				productId: "P2",
				productName: "Spoon",
				productSku: null,
				quantity: 1,
				unitPrice: 5.5,
				totalPrice: 5.5,
			}),
		],
		totals: {
			subtotal: 25.5,
			taxAmount: 2.55,
			shippingAmount: 9.99,
			discountAmount: 0,
			totalAmount: 38.04,
		},
		currency: "USD",
		shippingAddress: SHIPPING_ADDRESS,
		billingAddress: SHIPPING_ADDRESS,
		notes: null,
		cancellationReason: null,
		orderDate: new Date("2024-12-20T00:00:00.000Z"),
		shippedDate: status === OrderStatus.DELIVERED ? new Date("2024-12-28T00:00:00.000Z") : null,
		deliveredDate: status === OrderStatus.DELIVERED ? DELIVERED_AT : null,
		version: 3,
	});

describe("RefundCalculator", () => {
	const calculator = new RefundCalculator({ refundWindowDays: 30 });
	const delivered = orderIn(OrderStatus.DELIVERED);

	it("refunds the whole order total with every item for a full refund", () => {
		const result = calculator.calculate(
			delivered,
			{ type: RefundType.FULL, reason: "Damaged" },
			0,
			WITHIN_WINDOW
		);

		expect(result.amount).toBe(38.04);
		expect(result.remainingBefore).toBe(38.04);
		expect(result.items.map((item) => [item.orderItemId, item.quantity, item.amount])).toEqual([
			["i-1", 2, 20],
			["i-2", 1, 5.5],
		]);
	});

	it("sums the requested items for a partial refund", () => {
		const result = calculator.calculate(
			delivered,
			{ type: RefundType.PARTIAL, items: [{ orderItemId: "i-1", quantity: 1 }], reason: "One broke" },
			0,
			WITHIN_WINDOW
		);

		expect(result.amount).toBe(10);
		expect(result.items).toEqual([
			{
				orderItemId: "i-1",
				productId: "P1",
				productName: "Mug",
				productSku: "MUG-1",
				quantity: 1,
				unitPrice: 10,
				amount: 10,
			},
		]);
	});

	it("prefers an explicit amount over the item total", () => {
		const result = calculator.calculate(
			delivered,
			{
				type: RefundType.PARTIAL,
				amount: 15,
				items: [{ orderItemId: "i-2", quantity: 1 }],
				reason: "Goodwill",
			},
			0,
			WITHIN_WINDOW
		);

		expect(result.amount).toBe(15);
		expect(result.items).toHaveLength(1);
	});

	it("requires an amount or items for a partial refund", () => {
		expect(() =>
			calculator.calculate(
				delivered,
				{ type: RefundType.PARTIAL, reason: "Unspecified" },
				0,
				WITHIN_WINDOW
			)
		).toThrow(new InvalidStateError("Partial refund requires an amount or items"));
	});

	it("rejects unknown items and over-ordered quantities", () => {
		expect(() =>
			calculator.calculate(
				delivered,
				{ type: RefundType.PARTIAL, items: [{ orderItemId: "nope", quantity: 1 }], reason: "x" },
				0,
				WITHIN_WINDOW
			)
		).toThrow(new NotFoundError("Order item", "nope"));

		expect(() =>
			calculator.calculate(
				delivered,
				{ type: RefundType.PARTIAL, items: [{ orderItemId: "i-1", quantity: 3 }], reason: "x" },
				0,
				WITHIN_WINDOW
			)
		).toThrow("Refund quantity 3 is invalid for order item i-1 (ordered 2)");
	});

	it("never refunds more than what remains", () => {
		expect(() =>
			calculator.calculate(
				delivered,
				{ type: RefundType.PARTIAL, amount: 10, reason: "Again" },
				30,
				WITHIN_WINDOW
			)
		).toThrow("Refund amount 10 exceeds remaining refundable amount 8.04");

		expect(() =>
			calculator.calculate(
				delivered,
				{ type: RefundType.FULL, reason: "All of it" },
				10,
				WITHIN_WINDOW
			)
		).toThrow("Refund amount 38.04 exceeds remaining refundable amount 28.04");
	});

	it("only refunds delivered or cancelled orders", () => {
		expect(() =>
			calculator.calculate(
				orderIn(OrderStatus.SHIPPED),
				{ type: RefundType.FULL, reason: "Early" },
				0,
				WITHIN_WINDOW
			)
		).toThrow("Order ORD-20241220-0000ABCD cannot be refunded in status SHIPPED");

		expect(
			calculator.calculate(
				orderIn(OrderStatus.CANCELLED),
				{ type: RefundType.FULL, reason: "Cancelled" },
				0,
				new Date("2026-01-01T00:00:00.000Z")
			).amount
		).toBe(38.04);
	});

	it("closes the window the configured number of days after delivery", () => {
		expect(() =>
			calculator.calculate(
				delivered,
				{ type: RefundType.FULL, reason: "Late" },
				0,
				new Date("2025-02-15T00:00:00.000Z")
			)
		).toThrow(
			new InvalidStateError(
				"Refund window of 30 days has passed for order ORD-20241220-0000ABCD"
			)
		);
	});
});
