import type { Outbox } from "@/domain/entities/Outbox";
import { errorMessage } from "@/domain/errors/DomainError";
import type { OutgoingIntegrationEvent } from "@/infrastructure/events/IntegrationEvents";
import type { MessagingService } from "../ports/MessagingService";
import type { OutboxRepository } from "../ports/OutboxRepository";
import type { TransactionManager } from "../ports/TransactionManager";

export interface OutboxRunResult {
	published: number;
	failed: number;
}

export class ProcessOutboxUseCase {
	private static readonly LIMIT_QUERY = 100;

	constructor(
		private readonly outboxRepository: OutboxRepository,
		private readonly messagingService: MessagingService,
		private readonly transactionManager: TransactionManager,
		private readonly batchSize: number = ProcessOutboxUseCase.LIMIT_QUERY
	) {}

	/** Publishes one batch; rows stay locked until the batch is written back. */
	async execute(): Promise<OutboxRunResult> {
		return this.transactionManager.runInTransaction(async () => {
			const outboxes = await this.outboxRepository.getPending(this.batchSize);
			const result: OutboxRunResult = { published: 0, failed: 0 };

			for (const outbox of outboxes) {
				try {
					await this.publishOutbox(outbox);
					outbox.markAsProcessed();
					result.published++;
				} catch (error) {
					const message = errorMessage(error);
					console.error(
						`[Outbox] Failed to publish ${outbox.getEventType()} ${outbox.getEventId()}: ${message}`
					);
					outbox.incrementRetry(message);
					result.failed++;
				}
			}

			await this.outboxRepository.saveMany(outboxes);

			if (outboxes.length > 0) {
				console.log(
					`[Outbox] Batch done: ${result.published} published, ${result.failed} failed`
				);
			}
			return result;
		});
	}

	private async publishOutbox(outbox: Outbox): Promise<void> {
		const event: OutgoingIntegrationEvent = {
			eventId: outbox.getEventId(),
			eventType: outbox.getEventType(),
			payload: outbox.getPayload(),
			correlationId: outbox.getCorrelationId(),
			storeId: outbox.getStoreId(),
			version: outbox.getVersion(),
			occurredAt: outbox.getOccurredAt().toISOString(),
			exchange: outbox.getExchange(),
			routingKey: outbox.getRoutingKey(),
			source: outbox.getSource(),
		};

		await this.messagingService.publish(outbox.getExchange(), outbox.getRoutingKey(), event);
	}
}
