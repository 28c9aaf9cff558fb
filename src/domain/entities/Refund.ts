import { v7 as uuid } from "uuid";
import { generateRefundNumber } from "../documentNumbers";
import { InvalidStateError, ValidationError } from "../errors/DomainError";
import type { RefundDomainEvent } from "../events/DomainEvents";
import { RefundEvents } from "../events/RefundEvents";
import { toCents } from "../money";
import Entity from "./Entity";

export enum RefundType {
	FULL = "FULL",
	PARTIAL = "PARTIAL",
}

export enum RefundStatus {
	PENDING = "PENDING",
	PROCESSED = "PROCESSED",
}

export interface RefundItem {
	orderItemId: string;
	productId: string;
	productName: string;
	productSku: string | null;
	quantity: number;
	unitPrice: number;
	amount: number;
}

export interface RefundProps {
	id: string;
	storeId: string;
	refundNumber: string;
	orderId: string;
	orderNumber: string;
	type: RefundType;
	status: RefundStatus;
	amount: number;
	processedAmount: number | null;
	reason: string;
	refundMethod: string | null;
	notes: string | null;
	items: RefundItem[];
	requestedAt: Date;
	processedAt: Date | null;
}

export interface NewRefund {
	storeId: string;
	orderId: string;
	orderNumber: string;
	type: RefundType;
	amount: number;
	reason: string;
	refundMethod?: string | null;
	notes?: string | null;
	items: RefundItem[];
}

export class Refund extends Entity<RefundDomainEvent> {
	static request(input: NewRefund, now: Date = new Date()): Refund {
		const refund = new Refund({
			id: uuid(),
			storeId: input.storeId,
			refundNumber: generateRefundNumber(now),
			orderId: input.orderId,
			orderNumber: input.orderNumber,
			type: input.type,
			status: RefundStatus.PENDING,
			amount: input.amount,
			processedAmount: null,
			reason: input.reason,
			refundMethod: input.refundMethod ?? null,
			notes: input.notes ?? null,
			items: input.items,
			requestedAt: now,
			processedAt: null,
		});

		refund.addDomainEvent(RefundEvents.requested(refund));
		return refund;
	}

	static loadRefund(props: RefundProps): Refund {
		const refund = new Refund(props);
		refund.setWasUpdated(false);
		return refund;
	}

	private readonly storeId: string;
	private readonly refundNumber: string;
	private readonly orderId: string;
	private readonly orderNumber: string;
	private readonly type: RefundType;
	private status: RefundStatus;
	private readonly amount: number;
	private processedAmount: number | null;
	private readonly reason: string;
	private readonly refundMethod: string | null;
	private notes: string | null;
	private readonly items: RefundItem[];
	private readonly requestedAt: Date;
	private processedAt: Date | null;
	private wasUpdated: boolean;

	private constructor(props: RefundProps) {
		super(props.id);
		this.storeId = props.storeId;
		this.refundNumber = props.refundNumber;
		this.orderId = props.orderId;
		this.orderNumber = props.orderNumber;
		this.type = props.type;
		this.status = props.status;
		this.amount = props.amount;
		this.processedAmount = props.processedAmount;
		this.reason = props.reason;
		this.refundMethod = props.refundMethod;
		this.notes = props.notes;
		this.items = props.items;
		this.requestedAt = props.requestedAt;
		this.processedAt = props.processedAt;
		this.wasUpdated = true;
	}

	public process(processedAmount: number, notes?: string | null, now: Date = new Date()): void {
		if (this.status !== RefundStatus.PENDING) {
			throw new InvalidStateError(
				`Refund ${this.refundNumber} is already ${this.status}`
			);
		}
		if (toCents(processedAmount) <= 0 || toCents(processedAmount) > toCents(this.amount)) {
			throw new ValidationError(
				`Processed amount must be greater than 0 and at most ${this.amount}, got ${processedAmount}`
			);
		}

		this.status = RefundStatus.PROCESSED;
		this.processedAmount = processedAmount;
		this.processedAt = now;
		if (notes) {
			this.notes = notes;
		}
		this.wasUpdated = true;
		this.addDomainEvent(RefundEvents.processed(this, now));
	}

	public getStoreId(): string {
		return this.storeId;
	}

	public getRefundNumber(): string {
		return this.refundNumber;
	}

	public getOrderId(): string {
		return this.orderId;
	}

	public getOrderNumber(): string {
		return this.orderNumber;
	}

	public getType(): RefundType {
		return this.type;
	}

	public getStatus(): RefundStatus {
		return this.status;
	}

	public getAmount(): number {
		return this.amount;
	}

	public getProcessedAmount(): number | null {
		return this.processedAmount;
	}

	public getReason(): string {
		return this.reason;
	}

	public getRefundMethod(): string | null {
		return this.refundMethod;
	}

	public getNotes(): string | null {
		return this.notes;
	}

	public getItems(): RefundItem[] {
		return [...this.items];
	}

	public getRequestedAt(): Date {
		return this.requestedAt;
	}

	public getProcessedAt(): Date | null {
		return this.processedAt;
	}

	public getWasUpdated(): boolean {
		return this.wasUpdated;
	}

	public setWasUpdated(wasUpdated: boolean): void {
		this.wasUpdated = wasUpdated;
	}
}
