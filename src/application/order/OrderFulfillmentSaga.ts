import { v7 as uuid } from "uuid";
import { type AddressSnapshot, type NewOrderLine, Order } from "@/domain/entities/Order";
import {
	errorMessage,
	InsufficientStockError,
	InternalError,
	InvalidStateError,
	isDomainError,
	NotFoundError,
	UnauthorizedError,
	ValidationError,
} from "@/domain/errors/DomainError";
import type { OrderRepository } from "@/domain/repositories/OrderRepository";
import type { CartLine, CartProvider, CartSnapshot } from "../ports/CartProvider";
import type { CatalogLookup } from "../ports/CatalogLookup";
import type { PricingPolicy } from "../ports/PricingPolicy";
import type { StockLockManager } from "../ports/StockLockManager";
import type { TransactionManager } from "../ports/TransactionManager";
import type { OutboxEventRecorder } from "../services/OutboxEventRecorder";
import type { ReservationService } from "../services/ReservationService";
import type { StockLedgerService } from "../services/StockLedgerService";

export interface CreateOrderFromCartCommand {
	storeId: string;
	cartId: string;
	customerId: string;
	shippingInfo: AddressSnapshot;
	/** Defaults to the shipping address. */
	billingInfo?: AddressSnapshot | null;
	clearCartAfter: boolean;
	/** Idempotency key of this checkout attempt. */
	attemptId?: string;
	promoCode?: string | null;
	notes?: string | null;
	actor?: string;
}

export interface FulfillmentOptions {
	currency: string;
	reservationTtlMinutes: number;
}

interface HeldReservation {
	reservationId: string;
	productId: string;
	quantity: number;
}

export const reservationIdFor = (attemptId: string, productId: string): string =>
	`${attemptId}:${productId}`;

/**
 * Cart to order: validate, check and reserve stock under per-product locks,
 * persist the order, then confirm the holds into ledger decrements. Anything
 * that fails before the order is persisted releases the holds this run created.
 */
export class OrderFulfillmentSaga {
	constructor(
		private readonly cartProvider: CartProvider,
		private readonly catalogLookup: CatalogLookup,
		private readonly pricingPolicy: PricingPolicy,
		private readonly stockLedger: StockLedgerService,
		private readonly reservationService: ReservationService,
		private readonly stockLockManager: StockLockManager,
		private readonly orderRepository: OrderRepository,
		private readonly outboxEventRecorder: OutboxEventRecorder,
		private readonly transactionManager: TransactionManager,
		private readonly options: FulfillmentOptions = {
			currency: "USD",
			reservationTtlMinutes: 15,
		}
	) {}

	async createOrderFromCart(command: CreateOrderFromCartCommand): Promise<Order> {
		const { storeId, cartId } = command;
		const actor = command.actor ?? "system";
		const attemptId = command.attemptId ?? uuid();

		try {
			const cart = await this.validateCart(command);
			const lines = this.mergeLines(cart.items);

			const held = await this.stockLockManager.withProductLocks(
				storeId,
				lines.map((line) => line.productId),
				async () => {
					const tracked = await this.checkStock(storeId, lines);
					return this.reserve(storeId, cartId, tracked, attemptId, actor);
				}
			);

			const order = await this.persistOrRelease(command, lines, held);

			await this.confirmReservations(storeId, order, held, actor);

			if (command.clearCartAfter) {
				await this.clearCart(storeId, cartId);
			}

			console.log(
				`[Fulfillment] Created order ${order.getOrderNumber()} from cart ${cartId} (${held.length} reservation(s))`
			);
			return order;
		} catch (error) {
			if (isDomainError(error)) throw error;

			console.error(`[Fulfillment] Unexpected failure for cart ${cartId}:`, error);
			throw new InternalError(
				`Failed to create order from cart ${cartId}: ${errorMessage(error)}`,
				error
			);
		}
	}

	private async validateCart(command: CreateOrderFromCartCommand): Promise<CartSnapshot> {
		const cart = await this.transactionManager.runInSession(() =>
			this.cartProvider.getCartById(command.storeId, command.cartId)
		);

		if (!cart) {
			throw new NotFoundError("Cart", command.cartId);
		}
		if (cart.customerId !== command.customerId) {
			throw new UnauthorizedError(
				`Cart ${command.cartId} does not belong to customer ${command.customerId}`
			);
		}
		if (!cart.isActive) {
			throw new InvalidStateError(`Cart ${command.cartId} is not active`);
		}
		if (cart.isExpired) {
			throw new InvalidStateError(`Cart ${command.cartId} has expired`);
		}
		if (cart.isEmpty || cart.items.length === 0) {
			throw new InvalidStateError(`Cart ${command.cartId} is empty`);
		}

		return cart;
	}

	/** One line per product; quantities add up, the first unit price wins. */
	private mergeLines(items: CartLine[]): CartLine[] {
		const merged = new Map<string, CartLine>();

		for (const item of items) {
			if (!Number.isInteger(item.quantity) || item.quantity <= 0) {
				throw new ValidationError(
					`Cart line for product ${item.productId} has invalid quantity ${item.quantity}`
				);
			}

			const existing = merged.get(item.productId);
			merged.set(
				item.productId,
				existing ? { ...existing, quantity: existing.quantity + item.quantity } : { ...item }
			);
		}

		return [...merged.values()];
	}

	/** Returns the lines that need a hold; inventory-free products are skipped. */
	private async checkStock(storeId: string, lines: CartLine[]): Promise<CartLine[]> {
		const tracked: CartLine[] = [];

		for (const line of lines) {
			const stock = await this.stockLedger.getStock(storeId, line.productId);
			if (!stock) {
				throw new NotFoundError("Product", line.productId);
			}
			if (!stock.isTrackingInventory()) continue;

			const reserved = await this.reservationService.totalReserved(storeId, line.productId);
			const available = stock.getQuantity() - reserved;
			if (available < line.quantity) {
				throw new InsufficientStockError(line.productId, line.quantity, Math.max(available, 0));
			}

			tracked.push(line);
		}

		return tracked;
	}

	private async reserve(
		storeId: string,
		cartId: string,
		lines: CartLine[],
		attemptId: string,
		actor: string
	): Promise<HeldReservation[]> {
		const held: HeldReservation[] = [];

		for (const line of lines) {
			try {
				const reservation = await this.reservationService.create(storeId, {
					reservationId: reservationIdFor(attemptId, line.productId),
					productId: line.productId,
					quantity: line.quantity,
					ttlMinutes: this.options.reservationTtlMinutes,
					reservedBy: actor,
					reference: `CART-${cartId}`,
				});

				held.push({
					reservationId: reservation.getReservationId(),
					productId: line.productId,
					quantity: line.quantity,
				});
			} catch (error) {
				await this.releaseAll(storeId, held);
				throw error;
			}
		}

		return held;
	}

	private async persistOrRelease(
		command: CreateOrderFromCartCommand,
		lines: CartLine[],
		held: HeldReservation[]
	): Promise<Order> {
		try {
			return await this.persistOrder(command, lines, held);
		} catch (error) {
			await this.releaseAll(command.storeId, held);
			throw error;
		}
	}

	private async persistOrder(
		command: CreateOrderFromCartCommand,
		lines: CartLine[],
		held: HeldReservation[]
	): Promise<Order> {
		const { storeId } = command;
		const orderLines: NewOrderLine[] = [];

		for (const line of lines) {
			const product = await this.transactionManager.runInSession(() =>
				this.catalogLookup.getProductSnapshot(storeId, line.productId)
			);
			if (!product) {
				throw new NotFoundError("Product", line.productId);
			}

			orderLines.push({
				productId: line.productId,
				productName: product.name,
				productSku: product.sku,
				quantity: line.quantity,
				unitPrice: line.unitPrice,
			});
		}

		const totals = await this.pricingPolicy.quote({
			storeId,
			customerId: command.customerId,
			lines,
			promoCode: command.promoCode,
		});

		const order = Order.create({
			storeId,
			customerId: command.customerId,
			lines: orderLines,
			totals,
			currency: this.options.currency,
			shippingAddress: command.shippingInfo,
			billingAddress: command.billingInfo ?? command.shippingInfo,
			notes: command.notes,
		});

		await this.transactionManager.runInTransaction(async () => {
			await this.orderRepository.save(order);
			await this.reservationService.attachToOrder(
				storeId,
				held.map((reservation) => reservation.reservationId),
				order.getOrderNumber()
			);
			await this.outboxEventRecorder.record(order.pullDomainEvents());
		});

		return order;
	}

	/**
	 * Each hold is confirmed together with its ledger decrement. A failure here
	 * leaves the order in place; the hold lapses through the expiry sweep, or is
	 * released when the order is cancelled.
	 */
	private async confirmReservations(
		storeId: string,
		order: Order,
		held: HeldReservation[],
		actor: string
	): Promise<void> {
		for (const reservation of held) {
			try {
				await this.transactionManager.runInTransaction(async () => {
					await this.reservationService.confirm(storeId, reservation.reservationId);
					await this.stockLedger.consumeReservation(
						storeId,
						{
							productId: reservation.productId,
							quantity: reservation.quantity,
							reason: `Order creation: ${order.getOrderNumber()}`,
							reference: order.getOrderNumber(),
						},
						actor
					);
				});
			} catch (error) {
				console.warn(
					`[Fulfillment] Could not confirm reservation ${reservation.reservationId} for order ${order.getOrderNumber()}: ${errorMessage(error)}`
				);
			}
		}
	}

	private async releaseAll(storeId: string, held: HeldReservation[]): Promise<void> {
		for (const reservation of held) {
			try {
				await this.reservationService.release(storeId, reservation.reservationId);
			} catch (error) {
				console.error(
					`[Fulfillment] Failed to release reservation ${reservation.reservationId}; it will lapse on expiry:`,
					error
				);
			}
		}
	}

	private async clearCart(storeId: string, cartId: string): Promise<void> {
		try {
			await this.transactionManager.runInTransaction(() =>
				this.cartProvider.clearCart(storeId, cartId)
			);
		} catch (error) {
			console.warn(`[Fulfillment] Could not clear cart ${cartId}: ${errorMessage(error)}`);
		}
	}
}
