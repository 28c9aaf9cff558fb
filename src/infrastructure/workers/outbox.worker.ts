import { ProcessOutboxUseCase } from "@/application/use-cases/ProcessOutboxUseCase";
import { workerConfig } from "../config/config";
import { pool } from "../data-access/postgres/config";
import { PostgresTransactionManager } from "../data-access/postgres/PostgresTransactionManager";
import { PostgreOutboxRepository } from "../data-access/postgres/repositories/PostgreOutboxRepository";
import { RabbitMQMessagingService } from "../messaging/adapters/RabbitMQMessagingService";
import { sleep } from "../utils";

const messagingService = new RabbitMQMessagingService();
const useCase = new ProcessOutboxUseCase(
	new PostgreOutboxRepository(),
	messagingService,
	new PostgresTransactionManager(pool),
	workerConfig.outboxBatchSize
);

async function start() {
	await messagingService.connectWithRetry();
	console.log("[Outbox] Worker connected to RabbitMQ");

	while (true) {
		if (!messagingService.isConnected()) {
			console.log("[Outbox] Attempting to reconnect to RabbitMQ...");
			try {
				await messagingService.connectWithRetry();
			} catch (reconnectError) {
				console.error("[Outbox] Failed to reconnect:", reconnectError);
			}
		} else {
			try {
				const { published, failed } = await useCase.execute();
				if (published > 0 || failed > 0) {
					console.log(`[Outbox] Published ${published} event(s), ${failed} failed`);
				}
			} catch (error) {
				console.error("[Outbox] Worker error:", error);
			}
		}

		await sleep(workerConfig.outboxIntervalMs);
	}
}

start().catch((error) => {
	console.error("[Outbox] Worker stopped:", error);
	process.exit(1);
});
