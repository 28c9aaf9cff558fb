import { v7 as uuid } from "uuid";
import { generateOrderNumber } from "../documentNumbers";
import { InvalidTransitionError } from "../errors/DomainError";
import type { OrderDomainEvent } from "../events/DomainEvents";
import { OrderEvents } from "../events/OrderEvents";
import Entity from "./Entity";
import { OrderItem } from "./OrderItem";

export enum OrderStatus {
	PENDING = "PENDING",
	CONFIRMED = "CONFIRMED",
	PROCESSING = "PROCESSING",
	SHIPPED = "SHIPPED",
	DELIVERED = "DELIVERED",
	CANCELLED = "CANCELLED",
}

export const ORDER_STATE_TRANSITIONS: Record<OrderStatus, OrderStatus[]> = {
	[OrderStatus.PENDING]: [OrderStatus.CONFIRMED, OrderStatus.CANCELLED],

	[OrderStatus.CONFIRMED]: [OrderStatus.PROCESSING, OrderStatus.CANCELLED],

	[OrderStatus.PROCESSING]: [OrderStatus.SHIPPED, OrderStatus.CANCELLED],

	[OrderStatus.SHIPPED]: [OrderStatus.DELIVERED],

	[OrderStatus.DELIVERED]: [],

	[OrderStatus.CANCELLED]: [],
};

export interface AddressSnapshot {
	firstName: string;
	lastName: string;
	address1: string;
	address2?: string | null;
	city: string;
	state?: string | null;
	postalCode: string;
	country: string;
	phone?: string | null;
	email?: string | null;
}

export interface OrderTotals {
	subtotal: number;
	taxAmount: number;
	shippingAmount: number;
	discountAmount: number;
	totalAmount: number;
}

export interface OrderProps {
	id: string;
	storeId: string;
	orderNumber: string;
	customerId: string;
	status: OrderStatus;
	items: OrderItem[];
	totals: OrderTotals;
	currency: string;
	shippingAddress: AddressSnapshot;
	billingAddress: AddressSnapshot;
	notes: string | null;
	cancellationReason: string | null;
	orderDate: Date;
	shippedDate: Date | null;
	deliveredDate: Date | null;
	version: number;
}

export interface NewOrderLine {
	productId: string;
	productName: string;
	productSku: string | null;
	quantity: number;
	unitPrice: number;
}

export interface NewOrder {
	storeId: string;
	customerId: string;
	lines: NewOrderLine[];
	totals: OrderTotals;
	currency: string;
	shippingAddress: AddressSnapshot;
	billingAddress: AddressSnapshot;
	notes?: string | null;
}

export class Order extends Entity<OrderDomainEvent> {
	static create(input: NewOrder, now: Date = new Date()): Order {
		const id = uuid();
		const order = new Order({
			id,
			storeId: input.storeId,
			orderNumber: generateOrderNumber(now),
			customerId: input.customerId,
			status: OrderStatus.PENDING,
			items: input.lines.map((line) => OrderItem.create(id, line)),
			totals: input.totals,
			currency: input.currency,
			shippingAddress: input.shippingAddress,
			billingAddress: input.billingAddress,
			notes: input.notes ?? null,
			cancellationReason: null,
			orderDate: now,
			shippedDate: null,
			deliveredDate: null,
			version: 0,
		});

		order.addDomainEvent(OrderEvents.created(order));
		return order;
	}

	static loadOrder(props: OrderProps): Order {
		const order = new Order(props);
		order.setWasUpdated(false);
		return order;
	}

	private readonly storeId: string;
	private readonly orderNumber: string;
	private readonly customerId: string;
	private status: OrderStatus;
	private readonly items: OrderItem[];
	private readonly totals: OrderTotals;
	private readonly currency: string;
	private readonly shippingAddress: AddressSnapshot;
	private readonly billingAddress: AddressSnapshot;
	private readonly notes: string | null;
	private cancellationReason: string | null;
	private readonly orderDate: Date;
	private shippedDate: Date | null;
	private deliveredDate: Date | null;
	private version: number;
	private wasUpdated: boolean;

	private constructor(props: OrderProps) {
		super(props.id);
		this.storeId = props.storeId;
		this.orderNumber = props.orderNumber;
		this.customerId = props.customerId;
		this.status = props.status;
		this.items = props.items;
		this.totals = props.totals;
		this.currency = props.currency;
		this.shippingAddress = props.shippingAddress;
		this.billingAddress = props.billingAddress;
		this.notes = props.notes;
		this.cancellationReason = props.cancellationReason;
		this.orderDate = props.orderDate;
		this.shippedDate = props.shippedDate;
		this.deliveredDate = props.deliveredDate;
		this.version = props.version;
		this.wasUpdated = true;
	}

	public canTransitionTo(newStatus: OrderStatus): boolean {
		return ORDER_STATE_TRANSITIONS[this.status].includes(newStatus);
	}

	/**
	 * Moves the order along the lifecycle. Returns false when the order is already
	 * in the requested status. Cancellation goes through {@link cancel}.
	 */
	public transitionTo(newStatus: OrderStatus, when: Date = new Date()): boolean {
		if (newStatus === OrderStatus.CANCELLED) {
			return this.cancel("Status update", when);
		}
		if (this.status === newStatus) return false;

		if (!this.canTransitionTo(newStatus)) {
			throw new InvalidTransitionError(this.status, newStatus);
		}

		const previousStatus = this.status;
		this.setStatus(newStatus);

		if (newStatus === OrderStatus.SHIPPED) {
			this.shippedDate ??= when;
			this.addDomainEvent(OrderEvents.shipped(this));
			return true;
		}

		if (newStatus === OrderStatus.DELIVERED) {
			this.deliveredDate ??= when;
			this.addDomainEvent(OrderEvents.delivered(this));
			return true;
		}

		this.addDomainEvent(OrderEvents.statusChanged(this, previousStatus, when));
		return true;
	}

	public cancel(reason: string, when: Date = new Date()): boolean {
		if (this.status === OrderStatus.CANCELLED) return false;

		if (!this.canTransitionTo(OrderStatus.CANCELLED)) {
			throw new InvalidTransitionError(this.status, OrderStatus.CANCELLED);
		}

		const previousStatus = this.status;
		this.setStatus(OrderStatus.CANCELLED);
		this.cancellationReason = reason;
		this.addDomainEvent(OrderEvents.cancelled(this, previousStatus, when));
		return true;
	}

	public findItem(orderItemId: string): OrderItem | undefined {
		return this.items.find((item) => item.getId() === orderItemId);
	}

	public getStoreId(): string {
		return this.storeId;
	}

	public getOrderNumber(): string {
		return this.orderNumber;
	}

	public getCustomerId(): string {
		return this.customerId;
	}

	public getStatus(): OrderStatus {
		return this.status;
	}

	public getItems(): OrderItem[] {
		return [...this.items];
	}

	public getTotals(): OrderTotals {
		return { ...this.totals };
	}

	public getTotalAmount(): number {
		return this.totals.totalAmount;
	}

	public getCurrency(): string {
		return this.currency;
	}

	public getShippingAddress(): AddressSnapshot {
		return this.shippingAddress;
	}

	public getBillingAddress(): AddressSnapshot {
		return this.billingAddress;
	}

	public getNotes(): string | null {
		return this.notes;
	}

	public getCancellationReason(): string | null {
		return this.cancellationReason;
	}

	public getOrderDate(): Date {
		return this.orderDate;
	}

	public getShippedDate(): Date | null {
		return this.shippedDate;
	}

	public getDeliveredDate(): Date | null {
		return this.deliveredDate;
	}

	public getVersion(): number {
		return this.version;
	}

	public setVersion(version: number): void {
		this.version = version;
	}

	public getWasUpdated(): boolean {
		return this.wasUpdated;
	}

	public setWasUpdated(wasUpdated: boolean): void {
		this.wasUpdated = wasUpdated;
	}

	private setStatus(newStatus: OrderStatus): void {
		this.status = newStatus;
		this.wasUpdated = true;
	}
}
