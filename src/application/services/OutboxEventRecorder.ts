import { Outbox } from "@/domain/entities/Outbox";
import { InternalError } from "@/domain/errors/DomainError";
import type { FulfillmentDomainEvent } from "@/domain/events/DomainEvents";
import type { IntegrationEventMapper } from "../ports/IntegrationEventMapper";
import type { OutboxRepository } from "../ports/OutboxRepository";

/**
 * Turns domain events into outbox rows. Call it inside the transaction that
 * persists the state change so both commit or neither does.
 */
export class OutboxEventRecorder {
	constructor(
		private readonly outboxRepository: OutboxRepository,
		private readonly integrationEventMapper: IntegrationEventMapper
	) {}

	async record(events: FulfillmentDomainEvent[]): Promise<void> {
		if (events.length === 0) return;

		const outboxes = events.map((event) => {
			const mapped = this.integrationEventMapper.map(event);
			if (!mapped) {
				throw new InternalError(`NO_MAPPER_FOUND_FOR_EVENT: ${event.type}`);
			}

			return new Outbox(
				{
					eventType: mapped.eventType,
					payload: mapped.payload,
					correlationId: mapped.correlationId,
					storeId: mapped.storeId,
					version: mapped.version,
					occurredAt: new Date(mapped.occurredAt),
					exchange: mapped.exchange,
					routingKey: mapped.routingKey,
					source: mapped.source,
				},
				mapped.eventId
			);
		});

		await this.outboxRepository.saveMany(outboxes);
	}
}
