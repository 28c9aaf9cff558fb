import { beforeEach, describe, expect, it, vi } from "vitest";
import type { CreateOrderFromCartCommand } from "@/application/order/OrderFulfillmentSaga";
import { OrderStatus } from "@/domain/entities/Order";
import { ReservationStatus } from "@/domain/entities/StockReservation";
import type { ReservationTransition } from "@/domain/repositories/StockReservationRepository";
import {
	InsufficientStockError,
	InternalError,
	InvalidStateError,
	NotFoundError,
	ReservationConflictError,
	UnauthorizedError,
	ValidationError,
} from "@/domain/errors/DomainError";
import {
	buildTestContext,
	CUSTOMER_ID,
	SHIPPING_ADDRESS,
	STORE_ID,
	type TestContext,
} from "../../support/context";
import {
	InMemoryCartProvider,
	InMemoryStockReservationRepository,
} from "../../support/InMemoryRepositories";

const commandFor = (
	cartId: string,
	overrides: Partial<CreateOrderFromCartCommand> = {}
): CreateOrderFromCartCommand => ({
	storeId: STORE_ID,
	cartId,
	customerId: CUSTOMER_ID,
	shippingInfo: SHIPPING_ADDRESS,
	clearCartAfter: true,
	...overrides,
});

class ConfirmFailingReservationRepository extends InMemoryStockReservationRepository {
	async transitionFromActive(
		storeId: string,
		reservationId: string,
		transition: ReservationTransition
	) {
		if (transition.to === ReservationStatus.CONFIRMED) {
			throw new Error("reservation store unavailable");
		}
		return super.transitionFromActive(storeId, reservationId, transition);
	}
}

class ClearFailingCartProvider extends InMemoryCartProvider {
	async clearCart(): Promise<void> {
		throw new Error("cart store offline");
	}
}

const reservationStatuses = (ctx: TestContext): ReservationStatus[] =>
	[...ctx.db.tables.reservations.values()].map((row) => row.status);

describe("OrderFulfillmentSaga", () => {
	let ctx: TestContext;

	beforeEach(() => {
		vi.spyOn(console, "log").mockImplementation(() => {});
		vi.spyOn(console, "warn").mockImplementation(() => {});
		vi.spyOn(console, "error").mockImplementation(() => {});
		ctx = buildTestContext();
	});

	describe("successful checkout", () => {
		it("turns a cart into an order and decrements stock", async () => {
			ctx.seedProduct("P", { quantity: 5, lowStockThreshold: 2 });
			ctx.seedCart("cart-1", [{ productId: "P", quantity: 2, unitPrice: 10 }]);

			const order = await ctx.saga.createOrderFromCart(commandFor("cart-1"));

			expect(order.getStatus()).toBe(OrderStatus.PENDING);
			expect(order.getItems()).toHaveLength(1);
			expect(order.getItems()[0].getQuantity()).toBe(2);
			expect(order.getItems()[0].getProductName()).toBe("Product P");
			expect(ctx.quantityOf("P")).toBe(3);
			expect(reservationStatuses(ctx)).toEqual([ReservationStatus.CONFIRMED]);
			expect(ctx.db.tables.orders.size).toBe(1);
		});

		it("prices the order with tax and flat shipping", async () => {
			ctx.seedProduct("P", { quantity: 5 });
			ctx.seedCart("cart-1", [{ productId: "P", quantity: 2, unitPrice: 10 }]);

			const order = await ctx.saga.createOrderFromCart(commandFor("cart-1"));

			expect(order.getTotals()).toEqual({
				subtotal: 20,
				discountAmount: 0,
				taxAmount: 2,
				shippingAmount: 9.99,
				totalAmount: 31.99,
			});
			expect(order.getCurrency()).toBe("USD");
		});

		it("applies a promo code", async () => {
			ctx.seedProduct("P", { quantity: 5 });
			ctx.seedCart("cart-1", [{ productId: "P", quantity: 2, unitPrice: 10 }]);

			const order = await ctx.saga.createOrderFromCart(
				commandFor("cart-1", { promoCode: "VIP10" })
			);

			expect(order.getTotals().discountAmount).toBe(2);
			expect(order.getTotals().totalAmount).toBe(29.79);
		});

		it("writes an audit row referencing the order number", async () => {
			ctx.seedProduct("P", { quantity: 5 });
			ctx.seedCart("cart-1", [{ productId: "P", quantity: 2, unitPrice: 10 }]);

			const order = await ctx.saga.createOrderFromCart(
				commandFor("cart-1", { actor: "user-9" })
			);

			const [adjustment] = await ctx.adjustmentRepository.findByReference(
				STORE_ID,
				order.getOrderNumber()
			);
			expect(adjustment.getReason()).toBe(`Order creation: ${order.getOrderNumber()}`);
			expect(adjustment.getDelta()).toBe(-2);
			expect(adjustment.getAdjustedBy()).toBe("user-9");
		});

		it("clears the cart and records the created event", async () => {
			ctx.seedProduct("P", { quantity: 5 });
			ctx.seedCart("cart-1", [{ productId: "P", quantity: 1, unitPrice: 10 }]);

			await ctx.saga.createOrderFromCart(commandFor("cart-1"));

			const cart = await ctx.cartProvider.getCartById(STORE_ID, "cart-1");
			expect(cart?.status).toBe("CONVERTED");
			expect(cart?.isEmpty).toBe(true);
			expect(ctx.outboxEventTypes()).toEqual(["ORDER_CREATED"]);
		});

		it("keeps the cart when asked to", async () => {
			ctx.seedProduct("P", { quantity: 5 });
			ctx.seedCart("cart-1", [{ productId: "P", quantity: 1, unitPrice: 10 }]);

			await ctx.saga.createOrderFromCart(commandFor("cart-1", { clearCartAfter: false }));

			const cart = await ctx.cartProvider.getCartById(STORE_ID, "cart-1");
			expect(cart?.status).toBe("ACTIVE");
			expect(cart?.items).toHaveLength(1);
		});

		it("uses the shipping address for billing when none is given", async () => {
			ctx.seedProduct("P", { quantity: 5 });
			ctx.seedCart("cart-1", [{ productId: "P", quantity: 1, unitPrice: 10 }]);

			const order = await ctx.saga.createOrderFromCart(commandFor("cart-1"));

			expect(order.getBillingAddress()).toEqual(SHIPPING_ADDRESS);
		});

		it("merges repeated cart lines for the same product", async () => {
			ctx.seedProduct("P", { quantity: 5 });
			ctx.seedCart("cart-1", [
				{ productId: "P", quantity: 1, unitPrice: 10 },
				{ productId: "P", quantity: 2, unitPrice: 10 },
			]);

			const order = await ctx.saga.createOrderFromCart(commandFor("cart-1"));

			expect(order.getItems().map((item) => item.getQuantity())).toEqual([3]);
			expect(ctx.quantityOf("P")).toBe(2);
		});

		it("does not reserve products that skip inventory tracking", async () => {
			ctx.seedProduct("P", { quantity: 5 });
			ctx.seedProduct("GIFT-CARD", { quantity: 0, trackInventory: false });
			ctx.seedCart("cart-1", [
				{ productId: "P", quantity: 1, unitPrice: 10 },
				{ productId: "GIFT-CARD", quantity: 3, unitPrice: 25 },
			]);

			const order = await ctx.saga.createOrderFromCart(commandFor("cart-1"));

			expect(order.getItems()).toHaveLength(2);
			expect(ctx.db.tables.reservations.size).toBe(1);
			expect(ctx.quantityOf("GIFT-CARD")).toBe(0);
			expect(ctx.quantityOf("P")).toBe(4);
		});
	});

	describe("cart validation", () => {
		beforeEach(() => {
			ctx.seedProduct("P", { quantity: 5 });
		});

		const expectNothingCreated = () => {
			expect(ctx.db.tables.reservations.size).toBe(0);
			expect(ctx.db.tables.orders.size).toBe(0);
			expect(ctx.quantityOf("P")).toBe(5);
		};

		it("fails for an unknown cart", async () => {
			await expect(ctx.saga.createOrderFromCart(commandFor("nope"))).rejects.toThrow(
				new NotFoundError("Cart", "nope")
			);
			expectNothingCreated();
		});

		it("fails for a cart owned by someone else", async () => {
			ctx.seedCart("cart-1", [{ productId: "P", quantity: 1, unitPrice: 10 }], {
				customerId: "customer-2",
			});

			await expect(ctx.saga.createOrderFromCart(commandFor("cart-1"))).rejects.toBeInstanceOf(
				UnauthorizedError
			);
			expectNothingCreated();
		});

		it("fails for an inactive cart", async () => {
			ctx.seedCart("cart-1", [{ productId: "P", quantity: 1, unitPrice: 10 }], {
				status: "ABANDONED",
			});

			await expect(ctx.saga.createOrderFromCart(commandFor("cart-1"))).rejects.toThrow(
				new InvalidStateError("Cart cart-1 is not active")
			);
			expectNothingCreated();
		});

		it("fails for an expired cart", async () => {
			ctx.seedCart("cart-1", [{ productId: "P", quantity: 1, unitPrice: 10 }], {
				expiresAt: new Date(Date.now() - 60_000),
			});

			await expect(ctx.saga.createOrderFromCart(commandFor("cart-1"))).rejects.toThrow(
				new InvalidStateError("Cart cart-1 has expired")
			);
			expectNothingCreated();
		});

		it("fails for an empty cart", async () => {
			ctx.seedCart("cart-1", []);

			await expect(ctx.saga.createOrderFromCart(commandFor("cart-1"))).rejects.toThrow(
				new InvalidStateError("Cart cart-1 is empty")
			);
			expectNothingCreated();
		});

		it("fails for a cart line with a non-positive quantity", async () => {
			ctx.seedCart("cart-1", [{ productId: "P", quantity: 0, unitPrice: 10 }]);

			await expect(ctx.saga.createOrderFromCart(commandFor("cart-1"))).rejects.toBeInstanceOf(
				ValidationError
			);
			expectNothingCreated();
		});

		it("fails for a product missing from the store", async () => {
			ctx.seedCart("cart-1", [{ productId: "ghost", quantity: 1, unitPrice: 10 }]);

			await expect(ctx.saga.createOrderFromCart(commandFor("cart-1"))).rejects.toThrow(
				new NotFoundError("Product", "ghost")
			);
			expectNothingCreated();
		});
	});

	describe("stock shortfalls and compensation", () => {
		it("rejects a cart asking for more than is in stock", async () => {
			ctx.seedProduct("P", { quantity: 3 });
			ctx.seedCart("cart-1", [{ productId: "P", quantity: 10, unitPrice: 10 }]);

			const failure = ctx.saga.createOrderFromCart(commandFor("cart-1"));

			await expect(failure).rejects.toBeInstanceOf(InsufficientStockError);
			await expect(failure).rejects.toThrow(
				"Insufficient stock for product P: requested 10, available 3"
			);
			expect(ctx.quantityOf("P")).toBe(3);
			expect(ctx.db.tables.reservations.size).toBe(0);
			expect(ctx.db.tables.orders.size).toBe(0);
		});

		it("counts live holds of other checkouts as unavailable", async () => {
			ctx.seedProduct("P", { quantity: 5 });
			await ctx.reservationService.create(STORE_ID, {
				reservationId: "other-checkout:P",
				productId: "P",
				quantity: 4,
				reservedBy: "someone-else",
			});
			ctx.seedCart("cart-1", [{ productId: "P", quantity: 2, unitPrice: 10 }]);

			await expect(ctx.saga.createOrderFromCart(commandFor("cart-1"))).rejects.toThrow(
				"Insufficient stock for product P: requested 2, available 1"
			);
		});

		it("releases earlier holds when a later reservation fails", async () => {
			ctx.seedProduct("A", { quantity: 5 });
			ctx.seedProduct("B", { quantity: 10 });
			await ctx.reservationService.create(STORE_ID, {
				reservationId: "attempt-1:B",
				productId: "B",
				quantity: 1,
				reservedBy: "tester",
			});
			ctx.seedCart("cart-1", [
				{ productId: "A", quantity: 1, unitPrice: 10 },
				{ productId: "B", quantity: 1, unitPrice: 10 },
			]);

			await expect(
				ctx.saga.createOrderFromCart(commandFor("cart-1", { attemptId: "attempt-1" }))
			).rejects.toBeInstanceOf(ReservationConflictError);

			const held = await ctx.reservationService.findById(STORE_ID, "attempt-1:A");
			expect(held?.getStatus()).toBe(ReservationStatus.RELEASED);
			expect(await ctx.reservationService.totalReserved(STORE_ID, "A")).toBe(0);
			expect(ctx.db.tables.orders.size).toBe(0);
		});

		it("releases every hold when the order cannot be persisted", async () => {
			ctx.seedProduct("P", { quantity: 5 });
			ctx.seedCart("cart-1", [{ productId: "P", quantity: 2, unitPrice: 10 }]);
			vi.spyOn(ctx.pricingPolicy, "quote").mockRejectedValue(new Error("pricing down"));

			const failure = ctx.saga.createOrderFromCart(commandFor("cart-1"));

			await expect(failure).rejects.toBeInstanceOf(InternalError);
			await expect(failure).rejects.toThrow(
				"Failed to create order from cart cart-1: pricing down"
			);
			expect(reservationStatuses(ctx)).toEqual([ReservationStatus.RELEASED]);
			expect(ctx.quantityOf("P")).toBe(5);
			expect(ctx.db.tables.orders.size).toBe(0);
		});

		it("does not reserve twice for a retried attempt", async () => {
			ctx.seedProduct("P", { quantity: 5 });
			ctx.seedCart("cart-1", [{ productId: "P", quantity: 2, unitPrice: 10 }]);
			const command = commandFor("cart-1", { attemptId: "attempt-7", clearCartAfter: false });

			await ctx.saga.createOrderFromCart(command);
			await expect(ctx.saga.createOrderFromCart(command)).rejects.toThrow(
				new ReservationConflictError("Reservation attempt-7:P already exists")
			);

			expect(ctx.quantityOf("P")).toBe(3);
			expect(ctx.db.tables.orders.size).toBe(1);
		});

		it("never sells the last unit twice", async () => {
			ctx.seedProduct("P", { quantity: 1 });
			ctx.seedCart("cart-1", [{ productId: "P", quantity: 1, unitPrice: 10 }]);
			ctx.seedCart("cart-2", [{ productId: "P", quantity: 1, unitPrice: 10 }]);

			const results = await Promise.allSettled([
				ctx.saga.createOrderFromCart(commandFor("cart-1")),
				ctx.saga.createOrderFromCart(commandFor("cart-2")),
			]);

			const fulfilled = results.filter((result) => result.status === "fulfilled");
			const rejected = results.flatMap((result) =>
				result.status === "rejected" ? [result.reason] : []
			);
			expect(fulfilled).toHaveLength(1);
			expect(rejected).toHaveLength(1);
			expect(rejected[0]).toBeInstanceOf(InsufficientStockError);
			expect(ctx.quantityOf("P")).toBe(0);
			expect(ctx.db.tables.orders.size).toBe(1);
		});

		it("moves the holds from the cart reference to the order number", async () => {
			ctx.seedProduct("P", { quantity: 5 });
			ctx.seedCart("cart-1", [{ productId: "P", quantity: 1, unitPrice: 10 }]);

			const order = await ctx.saga.createOrderFromCart(commandFor("cart-1"));

			const references = [...ctx.db.tables.reservations.values()].map((row) => row.reference);
			expect(references).toEqual([order.getOrderNumber()]);
		});

		it("locks every product of the cart in sorted order", async () => {
			ctx.seedProduct("B", { quantity: 5 });
			ctx.seedProduct("A", { quantity: 5 });
			ctx.seedCart("cart-1", [
				{ productId: "B", quantity: 1, unitPrice: 10 },
				{ productId: "A", quantity: 1, unitPrice: 10 },
			]);

			await ctx.saga.createOrderFromCart(commandFor("cart-1"));

			expect(ctx.stockLockManager.acquired).toEqual([[`${STORE_ID}:A`, `${STORE_ID}:B`]]);
		});
	});

	describe("after the order is persisted", () => {
		it("keeps the order and the hold when a confirmation fails", async () => {
			ctx = buildTestContext({
				reservationRepository: (db) => new ConfirmFailingReservationRepository(db),
			});
			ctx.seedProduct("P", { quantity: 5 });
			ctx.seedCart("cart-1", [{ productId: "P", quantity: 2, unitPrice: 10 }]);

			const order = await ctx.saga.createOrderFromCart(
				commandFor("cart-1", { attemptId: "attempt-1" })
			);

			expect(order.getStatus()).toBe(OrderStatus.PENDING);
			expect(ctx.db.tables.orders.size).toBe(1);
			expect(ctx.quantityOf("P")).toBe(5);
			expect(ctx.db.tables.adjustments).toHaveLength(0);
			expect(reservationStatuses(ctx)).toEqual([ReservationStatus.ACTIVE]);
			expect(console.warn).toHaveBeenCalledWith(
				`[Fulfillment] Could not confirm reservation attempt-1:P for order ${order.getOrderNumber()}: reservation store unavailable`
			);
		});

		it("releases the unconfirmed hold when that order is cancelled", async () => {
			ctx = buildTestContext({
				reservationRepository: (db) => new ConfirmFailingReservationRepository(db),
			});
			ctx.seedProduct("P", { quantity: 5 });
			ctx.seedCart("cart-1", [{ productId: "P", quantity: 2, unitPrice: 10 }]);
			const order = await ctx.saga.createOrderFromCart(commandFor("cart-1"));

			const cancelled = await ctx.orderService.cancel(STORE_ID, order.getId(), "Customer request");

			expect(cancelled.getStatus()).toBe(OrderStatus.CANCELLED);
			expect(reservationStatuses(ctx)).toEqual([ReservationStatus.RELEASED]);
			expect(ctx.quantityOf("P")).toBe(5);
			expect(await ctx.reservationService.totalReserved(STORE_ID, "P")).toBe(0);
		});

		it("returns the order when the cart cannot be cleared", async () => {
			ctx = buildTestContext({
				cartProvider: (db) => new ClearFailingCartProvider(db),
			});
			ctx.seedProduct("P", { quantity: 5 });
			ctx.seedCart("cart-1", [{ productId: "P", quantity: 2, unitPrice: 10 }]);

			const order = await ctx.saga.createOrderFromCart(commandFor("cart-1"));

			expect(order.getStatus()).toBe(OrderStatus.PENDING);
			expect(ctx.quantityOf("P")).toBe(3);
			expect(reservationStatuses(ctx)).toEqual([ReservationStatus.CONFIRMED]);
			const cart = await ctx.cartProvider.getCartById(STORE_ID, "cart-1");
			expect(cart?.status).toBe("ACTIVE");
			expect(console.warn).toHaveBeenCalledWith(
				"[Fulfillment] Could not clear cart cart-1: cart store offline"
			);
		});
	});
});
