import type { OutboxRepository } from "@/application/ports/OutboxRepository";
import { MAX_OUTBOX_RETRIES, Outbox } from "@/domain/entities/Outbox";
import { errorMessage } from "@/domain/errors/DomainError";
import { saveStructuresWithConflictKey } from "../bulkOperations";
import { DbContext } from "../dbContext";

type OutboxEventRow = {
	outbox_events_event_id: string;
	outbox_events_event_type: string;
	outbox_events_payload: unknown;
	outbox_events_correlation_id: string | null;
	outbox_events_store_id: string;
	outbox_events_version: string;
	outbox_events_occurred_at: Date;
	outbox_events_exchange: string;
	outbox_events_routing_key: string;
	outbox_events_source: string;
	outbox_events_retry_count: number;
	outbox_events_error: string | null;
	outbox_events_created_at: Date;
	outbox_events_processed_at: Date | null;
};

export class PostgreOutboxRepository implements OutboxRepository {
	static outboxEventSql = `
        outbox_events.event_id AS outbox_events_event_id,
        outbox_events.event_type AS outbox_events_event_type,
        outbox_events.payload AS outbox_events_payload,
        outbox_events.correlation_id AS outbox_events_correlation_id,
        outbox_events.store_id AS outbox_events_store_id,
        outbox_events.version AS outbox_events_version,
        outbox_events.occurred_at AS outbox_events_occurred_at,
        outbox_events.exchange AS outbox_events_exchange,
        outbox_events.routing_key AS outbox_events_routing_key,
        outbox_events.source AS outbox_events_source,
        outbox_events.retry_count AS outbox_events_retry_count,
        outbox_events.error AS outbox_events_error,
        outbox_events.created_at AS outbox_events_created_at,
        outbox_events.processed_at AS outbox_events_processed_at
    `;

	private loadOutboxEvent(row: OutboxEventRow): Outbox {
		return Outbox.loadOutboxEvent({
			eventId: row.outbox_events_event_id,
			eventType: row.outbox_events_event_type,
			payload: row.outbox_events_payload,
			correlationId: row.outbox_events_correlation_id,
			storeId: row.outbox_events_store_id,
			version: row.outbox_events_version,
			occurredAt: row.outbox_events_occurred_at,
			exchange: row.outbox_events_exchange,
			routingKey: row.outbox_events_routing_key,
			source: row.outbox_events_source,
			retryCount: row.outbox_events_retry_count,
			error: row.outbox_events_error,
			createdAt: row.outbox_events_created_at,
			processedAt: row.outbox_events_processed_at,
		});
	}

	private getOutboxEventDbStructure(outbox: Outbox) {
		return {
			event_id: outbox.getEventId(),
			event_type: outbox.getEventType(),
			payload: JSON.stringify(outbox.getPayload()),
			correlation_id: outbox.getCorrelationId(),
			store_id: outbox.getStoreId(),
			version: outbox.getVersion(),
			occurred_at: outbox.getOccurredAt(),
			exchange: outbox.getExchange(),
			routing_key: outbox.getRoutingKey(),
			source: outbox.getSource(),
			retry_count: outbox.getRetryCount(),
			error: outbox.getError(),
			created_at: outbox.getCreatedAt(),
			processed_at: outbox.getProcessedAt(),
		};
	}

	async getPending(limit: number): Promise<Outbox[]> {
		try {
			const sql = `
                SELECT
                    ${PostgreOutboxRepository.outboxEventSql}
                FROM fulfillment.outbox_events
                WHERE processed_at IS NULL
                AND retry_count < $2
                ORDER BY created_at ASC
                LIMIT $1
                FOR UPDATE SKIP LOCKED
            `;

			const client = DbContext.getClient();
			const { rows, rowCount } = await client.query<OutboxEventRow>(sql, [
				limit,
				MAX_OUTBOX_RETRIES,
			]);

			if (rowCount === 0) {
				return [];
			}
			return rows.map((row) => this.loadOutboxEvent(row));
		} catch (error) {
			console.error(`Error getting pending outbox events with limit ${limit}:`, error);
			throw new Error(`Failed to get pending outbox events: ${errorMessage(error)}`);
		}
	}

	async saveMany(outboxes: Outbox[]): Promise<void> {
		const changed = outboxes.filter((outbox) => outbox.getWasUpdated());
		if (changed.length === 0) return;

		try {
			const client = DbContext.getClient();
			await saveStructuresWithConflictKey(
				changed.map((outbox) => this.getOutboxEventDbStructure(outbox)),
				"fulfillment.outbox_events",
				"(event_id)",
				client,
				{ touchUpdatedAt: true }
			);
			for (const outbox of changed) {
				outbox.setWasUpdated(false);
			}
		} catch (error) {
			console.error("Error saving outbox events:", error);
			throw new Error(`Failed to save outbox events: ${errorMessage(error)}`);
		}
	}
}
