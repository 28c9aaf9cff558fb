import { ValidationError } from "../errors/DomainError";
import Entity from "./Entity";

export enum ReservationStatus {
	ACTIVE = "ACTIVE",
	CONFIRMED = "CONFIRMED",
	RELEASED = "RELEASED",
	EXPIRED = "EXPIRED",
}

export interface StockReservationProps {
	reservationId: string;
	storeId: string;
	productId: string;
	quantity: number;
	status: ReservationStatus;
	reservedAt: Date;
	expiresAt: Date;
	reservedBy: string;
	reference: string | null;
	notes: string | null;
	updatedAt: Date;
}

export interface NewStockReservation {
	reservationId: string;
	storeId: string;
	productId: string;
	quantity: number;
	ttlMinutes: number;
	reservedBy: string;
	reference?: string | null;
	notes?: string | null;
}

/**
 * A time-boxed hold on stock. Leaves ACTIVE at most once; the persisted
 * transition is a compare-and-set on status done by the repository.
 */
export class StockReservation extends Entity {
	static create(input: NewStockReservation, now: Date = new Date()): StockReservation {
		if (!Number.isInteger(input.quantity) || input.quantity <= 0) {
			throw new ValidationError(
				`Reservation quantity must be a positive integer, got ${input.quantity}`
			);
		}
		if (!(input.ttlMinutes > 0)) {
			throw new ValidationError(
				`Reservation TTL must be positive, got ${input.ttlMinutes}`
			);
		}

		return new StockReservation({
			reservationId: input.reservationId,
			storeId: input.storeId,
			productId: input.productId,
			quantity: input.quantity,
			status: ReservationStatus.ACTIVE,
			reservedAt: now,
			expiresAt: new Date(now.getTime() + Math.round(input.ttlMinutes * 60_000)),
			reservedBy: input.reservedBy,
			reference: input.reference ?? null,
			notes: input.notes ?? null,
			updatedAt: now,
		});
	}

	static loadStockReservation(props: StockReservationProps): StockReservation {
		return new StockReservation(props);
	}

	private readonly storeId: string;
	private readonly productId: string;
	private readonly quantity: number;
	private readonly status: ReservationStatus;
	private readonly reservedAt: Date;
	private readonly expiresAt: Date;
	private readonly reservedBy: string;
	private readonly reference: string | null;
	private readonly notes: string | null;
	private readonly updatedAt: Date;

	private constructor(props: StockReservationProps) {
		super(props.reservationId);
		this.storeId = props.storeId;
		this.productId = props.productId;
		this.quantity = props.quantity;
		this.status = props.status;
		this.reservedAt = props.reservedAt;
		this.expiresAt = props.expiresAt;
		this.reservedBy = props.reservedBy;
		this.reference = props.reference;
		this.notes = props.notes;
		this.updatedAt = props.updatedAt;
	}

	public isActive(): boolean {
		return this.status === ReservationStatus.ACTIVE;
	}

	/** Active and not yet past its expiry. */
	public isLive(now: Date = new Date()): boolean {
		return this.isActive() && this.expiresAt.getTime() > now.getTime();
	}

	public getReservationId(): string {
		return this.getId();
	}

	public getStoreId(): string {
		return this.storeId;
	}

	public getProductId(): string {
		return this.productId;
	}

	public getQuantity(): number {
		return this.quantity;
	}

	public getStatus(): ReservationStatus {
		return this.status;
	}

	public getReservedAt(): Date {
		return this.reservedAt;
	}

	public getExpiresAt(): Date {
		return this.expiresAt;
	}

	public getReservedBy(): string {
		return this.reservedBy;
	}

	public getReference(): string | null {
		return this.reference;
	}

	public getNotes(): string | null {
		return this.notes;
	}

	public getUpdatedAt(): Date {
		return this.updatedAt;
	}
}
