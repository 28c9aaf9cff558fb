import type { Outbox } from "@/domain/entities/Outbox";

export interface OutboxRepository {
	/** Unprocessed events under the retry ceiling, oldest first, row-locked. */
	getPending(limit: number): Promise<Outbox[]>;
	saveMany(outboxes: Outbox[]): Promise<void>;
}
