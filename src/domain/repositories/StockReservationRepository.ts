import type { ReservationStatus, StockReservation } from "../entities/StockReservation";

export interface ReservationTransition {
	to: ReservationStatus.CONFIRMED | ReservationStatus.RELEASED;
	now: Date;
	/** Only transition while expires_at is still in the future. */
	requireUnexpired: boolean;
}

export interface StockReservationRepository {
	/** Throws ReservationConflictError when the id is already taken in the store. */
	insert(reservation: StockReservation): Promise<void>;
	findById(storeId: string, reservationId: string): Promise<StockReservation | null>;
	/**
	 * Compare-and-set from ACTIVE. Returns the updated reservation, or null when
	 * the row was missing or no longer ACTIVE (or expired, if required).
	 */
	transitionFromActive(
		storeId: string,
		reservationId: string,
		transition: ReservationTransition
	): Promise<StockReservation | null>;
	totalReserved(storeId: string, productId: string, now: Date): Promise<number>;
	/** Points the still-ACTIVE reservations among `reservationIds` at a new reference. */
	reassignReference(
		storeId: string,
		reservationIds: string[],
		reference: string,
		now: Date
	): Promise<void>;
	/** Flips every ACTIVE reservation carrying `reference` to RELEASED. */
	releaseActiveByReference(
		storeId: string,
		reference: string,
		now: Date
	): Promise<StockReservation[]>;
	/** Flips up to `limit` lapsed ACTIVE reservations (any store) to EXPIRED. */
	expireLapsed(now: Date, limit: number): Promise<StockReservation[]>;
}
