import { DatabaseError } from "pg";
import {
	ReservationStatus,
	StockReservation,
} from "@domain/entities/StockReservation";
import {
	errorMessage,
	ReservationConflictError,
} from "@domain/errors/DomainError";
import type {
	ReservationTransition,
	StockReservationRepository,
} from "@domain/repositories/StockReservationRepository";
import { DbContext } from "../dbContext";

type ReservationRow = {
	stock_reservations_reservation_id: string;
	stock_reservations_store_id: string;
	stock_reservations_product_id: string;
	stock_reservations_quantity: number;
	stock_reservations_status: ReservationStatus;
	stock_reservations_reserved_at: Date;
	stock_reservations_expires_at: Date;
	stock_reservations_reserved_by: string;
	stock_reservations_reference: string | null;
	stock_reservations_notes: string | null;
	stock_reservations_updated_at: Date;
};

const UNIQUE_VIOLATION = "23505";

export class PostgreStockReservationRepository implements StockReservationRepository {
	static reservationSql = `
  stock_reservations.reservation_id AS stock_reservations_reservation_id,
  stock_reservations.store_id AS stock_reservations_store_id,
  stock_reservations.product_id AS stock_reservations_product_id,
  stock_reservations.quantity AS stock_reservations_quantity,
  stock_reservations.status AS stock_reservations_status,
  stock_reservations.reserved_at AS stock_reservations_reserved_at,
  stock_reservations.expires_at AS stock_reservations_expires_at,
  stock_reservations.reserved_by AS stock_reservations_reserved_by,
  stock_reservations.reference AS stock_reservations_reference,
  stock_reservations.notes AS stock_reservations_notes,
  stock_reservations.updated_at AS stock_reservations_updated_at
`;

	private loadStockReservation(row: ReservationRow): StockReservation {
		return StockReservation.loadStockReservation({
			reservationId: row.stock_reservations_reservation_id,
			storeId: row.stock_reservations_store_id,
			productId: row.stock_reservations_product_id,
			quantity: row.stock_reservations_quantity,
			status: row.stock_reservations_status,
			reservedAt: row.stock_reservations_reserved_at,
			expiresAt: row.stock_reservations_expires_at,
			reservedBy: row.stock_reservations_reserved_by,
			reference: row.stock_reservations_reference,
			notes: row.stock_reservations_notes,
			updatedAt: row.stock_reservations_updated_at,
		});
	}

	async insert(reservation: StockReservation): Promise<void> {
		try {
			const sql = `
    INSERT INTO fulfillment.stock_reservations (
      reservation_id, store_id, product_id, quantity, status,
      reserved_at, expires_at, reserved_by, reference, notes, updated_at
    ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
`;
			const client = DbContext.getClient();
			await client.query(sql, [
				reservation.getReservationId(),
				reservation.getStoreId(),
				reservation.getProductId(),
				reservation.getQuantity(),
				reservation.getStatus(),
				reservation.getReservedAt(),
				reservation.getExpiresAt(),
				reservation.getReservedBy(),
				reservation.getReference(),
				reservation.getNotes(),
				reservation.getUpdatedAt(),
			]);
		} catch (error) {
			if (error instanceof DatabaseError && error.code === UNIQUE_VIOLATION) {
				throw new ReservationConflictError(
					`Reservation ${reservation.getReservationId()} already exists`
				);
			}
			console.error(`Error inserting reservation ${reservation.getReservationId()}:`, error);
			throw new Error(`Failed to insert reservation: ${errorMessage(error)}`);
		}
	}

	async findById(storeId: string, reservationId: string): Promise<StockReservation | null> {
		try {
			const sql = `
    SELECT
      ${PostgreStockReservationRepository.reservationSql}
    FROM fulfillment.stock_reservations
    WHERE stock_reservations.store_id = $1
    AND stock_reservations.reservation_id = $2
`;
			const client = DbContext.getClient();
			const { rows, rowCount } = await client.query<ReservationRow>(sql, [
				storeId,
				reservationId,
			]);

			if (rowCount === 0) {
				return null;
			}
			return this.loadStockReservation(rows[0]);
		} catch (error) {
			console.error(`Error finding reservation ${reservationId}:`, error);
			throw new Error(`Failed to find reservation: ${errorMessage(error)}`);
		}
	}

	async transitionFromActive(
		storeId: string,
		reservationId: string,
		transition: ReservationTransition
	): Promise<StockReservation | null> {
		try {
			const sql = `
    UPDATE fulfillment.stock_reservations
    SET status = $1,
        updated_at = $2
    WHERE store_id = $3
    AND reservation_id = $4
    AND status = '${ReservationStatus.ACTIVE}'
    ${transition.requireUnexpired ? "AND expires_at > $2" : ""}
    RETURNING
      ${PostgreStockReservationRepository.reservationSql}
`;
			const client = DbContext.getClient();
			const { rows, rowCount } = await client.query<ReservationRow>(sql, [
				transition.to,
				transition.now,
				storeId,
				reservationId,
			]);

			if (rowCount === 0) {
				return null;
			}
			return this.loadStockReservation(rows[0]);
		} catch (error) {
			console.error(`Error moving reservation ${reservationId} to ${transition.to}:`, error);
			throw new Error(`Failed to update reservation: ${errorMessage(error)}`);
		}
	}

	async totalReserved(storeId: string, productId: string, now: Date): Promise<number> {
		try {
			const sql = `
    SELECT COALESCE(SUM(quantity), 0) AS total
    FROM fulfillment.stock_reservations
    WHERE store_id = $1
    AND product_id = $2
    AND status = '${ReservationStatus.ACTIVE}'
    AND expires_at > $3
`;
			const client = DbContext.getClient();
			const { rows } = await client.query<{ total: string }>(sql, [storeId, productId, now]);

			return Number(rows[0]?.total ?? 0);
		} catch (error) {
			console.error(`Error summing reservations of product ${productId}:`, error);
			throw new Error(`Failed to sum reservations: ${errorMessage(error)}`);
		}
	}

	async reassignReference(
		storeId: string,
		reservationIds: string[],
		reference: string,
		now: Date
	): Promise<void> {
		if (reservationIds.length === 0) return;

		try {
			const sql = `
    UPDATE fulfillment.stock_reservations
    SET reference = $1,
        updated_at = $2
    WHERE store_id = $3
    AND reservation_id = ANY($4::text[])
    AND status = '${ReservationStatus.ACTIVE}'
`;
			const client = DbContext.getClient();
			await client.query(sql, [reference, now, storeId, reservationIds]);
		} catch (error) {
			console.error(`Error attaching reservations to ${reference}:`, error);
			throw new Error(`Failed to update reservation references: ${errorMessage(error)}`);
		}
	}

	async releaseActiveByReference(
		storeId: string,
		reference: string,
		now: Date
	): Promise<StockReservation[]> {
		try {
			const sql = `
    UPDATE fulfillment.stock_reservations
    SET status = '${ReservationStatus.RELEASED}',
        updated_at = $1
    WHERE store_id = $2
    AND reference = $3
    AND status = '${ReservationStatus.ACTIVE}'
    RETURNING
      ${PostgreStockReservationRepository.reservationSql}
`;
			const client = DbContext.getClient();
			const { rows } = await client.query<ReservationRow>(sql, [now, storeId, reference]);

			return rows.map((row) => this.loadStockReservation(row));
		} catch (error) {
			console.error(`Error releasing reservations of ${reference}:`, error);
			throw new Error(`Failed to release reservations: ${errorMessage(error)}`);
		}
	}

	async expireLapsed(now: Date, limit: number): Promise<StockReservation[]> {
		try {
			const sql = `
    UPDATE fulfillment.stock_reservations
    SET status = '${ReservationStatus.EXPIRED}',
        updated_at = $1
    WHERE (store_id, reservation_id) IN (
      SELECT store_id, reservation_id
      FROM fulfillment.stock_reservations
      WHERE status = '${ReservationStatus.ACTIVE}'
      AND expires_at <= $1
      ORDER BY expires_at ASC
      LIMIT $2
      FOR UPDATE SKIP LOCKED
    )
    AND status = '${ReservationStatus.ACTIVE}'
    RETURNING
      ${PostgreStockReservationRepository.reservationSql}
`;
			const client = DbContext.getClient();
			const { rows } = await client.query<ReservationRow>(sql, [now, limit]);

			return rows.map((row) => this.loadStockReservation(row));
		} catch (error) {
			console.error("Error expiring lapsed reservations:", error);
			throw new Error(`Failed to expire reservations: ${errorMessage(error)}`);
		}
	}
}
