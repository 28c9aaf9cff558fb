import {
	ReservationStatus,
	StockReservation,
} from "@/domain/entities/StockReservation";
import { NotFoundError, ReservationConflictError } from "@/domain/errors/DomainError";
import type { StockReservationRepository } from "@/domain/repositories/StockReservationRepository";
import type { TransactionManager } from "../ports/TransactionManager";

export interface ReservationRequest {
	reservationId: string;
	productId: string;
	quantity: number;
	/** Fractions are allowed; defaults to the service's configured TTL. */
	ttlMinutes?: number;
	reservedBy: string;
	reference?: string | null;
	notes?: string | null;
}

export interface ReservationServiceOptions {
	defaultTtlMinutes: number;
}

export const DEFAULT_RESERVATION_TTL_MINUTES = 15;

export class ReservationService {
	constructor(
		private readonly reservationRepository: StockReservationRepository,
		private readonly transactionManager: TransactionManager,
		private readonly options: ReservationServiceOptions = {
			defaultTtlMinutes: DEFAULT_RESERVATION_TTL_MINUTES,
		}
	) {}

	async create(storeId: string, request: ReservationRequest): Promise<StockReservation> {
		return this.transactionManager.runInTransaction(async () => {
			const existing = await this.reservationRepository.findById(
				storeId,
				request.reservationId
			);
			if (existing) {
				throw new ReservationConflictError(
					`Reservation ${request.reservationId} already exists`
				);
			}

			const reservation = StockReservation.create({
				reservationId: request.reservationId,
				storeId,
				productId: request.productId,
				quantity: request.quantity,
				ttlMinutes: request.ttlMinutes ?? this.options.defaultTtlMinutes,
				reservedBy: request.reservedBy,
				reference: request.reference,
				notes: request.notes,
			});

			await this.reservationRepository.insert(reservation);
			return reservation;
		});
	}

	async confirm(storeId: string, reservationId: string): Promise<StockReservation> {
		return this.transactionManager.runInTransaction(async () => {
			const confirmed = await this.reservationRepository.transitionFromActive(
				storeId,
				reservationId,
				{ to: ReservationStatus.CONFIRMED, now: new Date(), requireUnexpired: true }
			);
			if (confirmed) return confirmed;

			const current = await this.reservationRepository.findById(storeId, reservationId);
			if (!current) {
				throw new NotFoundError("Reservation", reservationId);
			}

			const state = current.isActive() ? "EXPIRED (lapsed)" : current.getStatus();
			throw new ReservationConflictError(
				`Reservation ${reservationId} cannot be confirmed from ${state}`
			);
		});
	}

	/** Releasing a reservation that already left ACTIVE changes nothing. */
	async release(storeId: string, reservationId: string): Promise<StockReservation> {
		return this.transactionManager.runInTransaction(async () => {
			const released = await this.reservationRepository.transitionFromActive(
				storeId,
				reservationId,
				{ to: ReservationStatus.RELEASED, now: new Date(), requireUnexpired: false }
			);
			if (released) return released;

			const current = await this.reservationRepository.findById(storeId, reservationId);
			if (!current) {
				throw new NotFoundError("Reservation", reservationId);
			}
			return current;
		});
	}

	/** Moves the order's holds from the cart reference to the order number. */
	async attachToOrder(
		storeId: string,
		reservationIds: string[],
		orderNumber: string
	): Promise<void> {
		await this.transactionManager.runInTransaction(() =>
			this.reservationRepository.reassignReference(
				storeId,
				reservationIds,
				orderNumber,
				new Date()
			)
		);
	}

	/** Releases holds of the order that were never confirmed. */
	async releaseForOrder(storeId: string, orderNumber: string): Promise<StockReservation[]> {
		const released = await this.transactionManager.runInTransaction(() =>
			this.reservationRepository.releaseActiveByReference(storeId, orderNumber, new Date())
		);

		if (released.length > 0) {
			console.log(
				`[Reservations] Released ${released.length} unconfirmed reservation(s) of ${orderNumber}`
			);
		}
		return released;
	}

	async expireSweep(batchLimit: number): Promise<StockReservation[]> {
		const expired = await this.transactionManager.runInTransaction(() =>
			this.reservationRepository.expireLapsed(new Date(), batchLimit)
		);

		if (expired.length > 0) {
			console.log(`[Reservations] Expired ${expired.length} lapsed reservation(s)`);
		}
		return expired;
	}

	async totalReserved(storeId: string, productId: string): Promise<number> {
		return this.transactionManager.runInSession(() =>
			this.reservationRepository.totalReserved(storeId, productId, new Date())
		);
	}

	async findById(storeId: string, reservationId: string): Promise<StockReservation | null> {
		return this.transactionManager.runInSession(() =>
			this.reservationRepository.findById(storeId, reservationId)
		);
	}
}
