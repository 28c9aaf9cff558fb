import { ReservationService } from "@/application/services/ReservationService";
import { fulfillmentConfig, workerConfig } from "../config/config";
import { pool } from "../data-access/postgres/config";
import { PostgresTransactionManager } from "../data-access/postgres/PostgresTransactionManager";
import { PostgreStockReservationRepository } from "../data-access/postgres/repositories/PostgreStockReservationRepository";
import { sleep } from "../utils";

const reservationService = new ReservationService(
	new PostgreStockReservationRepository(),
	new PostgresTransactionManager(pool),
	{ defaultTtlMinutes: fulfillmentConfig.reservationTtlMinutes }
);

async function start() {
	console.log(
		`[Reservations] Expiry sweep every ${workerConfig.reservationSweepIntervalMs}ms (batch ${workerConfig.reservationSweepBatchSize})`
	);

	while (true) {
		try {
			await reservationService.expireSweep(workerConfig.reservationSweepBatchSize);
		} catch (error) {
			console.error("[Reservations] Expiry sweep failed:", error);
		}

		await sleep(workerConfig.reservationSweepIntervalMs);
	}
}

start().catch((error) => {
	console.error("[Reservations] Expiry worker stopped:", error);
	process.exit(1);
});
