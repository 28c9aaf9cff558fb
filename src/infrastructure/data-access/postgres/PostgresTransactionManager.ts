import type { Pool } from "pg";
import type { TransactionManager } from "@/application/ports/TransactionManager";
import { DbContext } from "./dbContext";

export class PostgresTransactionManager implements TransactionManager {
	constructor(private readonly pool: Pool) {}

	async runInTransaction<T>(work: () => Promise<T>): Promise<T> {
		if (DbContext.isInTransaction()) {
			return work();
		}

		const client = await this.pool.connect();
		try {
			await client.query("BEGIN");
			const result = await DbContext.run(client, work, true);
			await client.query("COMMIT");
			return result;
		} catch (error) {
			try {
				await client.query("ROLLBACK");
			} catch (rollbackError) {
				console.error("[Postgres] Rollback failed:", rollbackError);
			}
			throw error;
		} finally {
			client.release();
		}
	}

	async runInSession<T>(work: () => Promise<T>): Promise<T> {
		if (DbContext.hasClient()) {
			return work();
		}

		const client = await this.pool.connect();
		try {
			return await DbContext.run(client, work);
		} finally {
			client.release();
		}
	}
}
