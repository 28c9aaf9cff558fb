import type { MessagingService } from "@application/ports/MessagingService";
import * as amqp from "amqplib";
import { rabbitmqConfig } from "../../config/config";
import { sleep } from "../../utils";

type AmqpConnection = Awaited<ReturnType<typeof amqp.connect>>;
type AmqpChannel = Awaited<ReturnType<AmqpConnection["createChannel"]>>;

export class RabbitMQMessagingService implements MessagingService {
	private connection: AmqpConnection | null = null;
	private channel: AmqpChannel | null = null;
	private readonly assertedExchanges = new Set<string>();

	constructor(private readonly url: string = rabbitmqConfig.url) {}

	public isConnected(): boolean {
		return this.connection !== null && this.channel !== null;
	}

	async connect(): Promise<void> {
		try {
			const connection = await amqp.connect(this.url);
			this.channel = await connection.createChannel();
			this.connection = connection;

			connection.on("error", (err: Error) => {
				console.error("RabbitMQ connection error:", err.message);
				this.cleanup();
			});

			connection.on("close", () => {
				console.warn("RabbitMQ connection closed");
				this.cleanup();
			});

			console.log("[RabbitMQ] Connected");
		} catch (error) {
			this.cleanup();
			console.error("[RabbitMQ] Failed to connect", error);
			throw error;
		}
	}

	/** Retries the initial connection a bounded number of times. */
	async connectWithRetry(
		retries: number = rabbitmqConfig.connectRetries,
		delayMs: number = rabbitmqConfig.connectRetryDelayMs
	): Promise<void> {
		for (let attempt = 1; attempt <= retries; attempt++) {
			try {
				await this.connect();
				return;
			} catch (error) {
				console.log(
					`[RabbitMQ] Connection attempt ${attempt}/${retries} failed. Retrying in ${delayMs}ms...`
				);
				if (attempt === retries) {
					throw new Error(
						`Could not connect to RabbitMQ after ${retries} attempts: ${error instanceof Error ? error.message : "Unknown error"}`
					);
				}
				await sleep(delayMs);
			}
		}
	}

	async publish<T>(exchange: string, routingKey: string, message: T): Promise<void> {
		if (!this.channel) {
			throw new Error("RabbitMQ channel is not available.");
		}

		try {
			if (!this.assertedExchanges.has(exchange)) {
				await this.channel.assertExchange(exchange, "topic", { durable: true });
				this.assertedExchanges.add(exchange);
			}
			this.channel.publish(exchange, routingKey, Buffer.from(JSON.stringify(message)), {
				contentType: "application/json",
				persistent: true,
			});
		} catch (error) {
			console.error("[RabbitMQ] ERROR_PUBLISHING_EVENT", {
				to_exchange: exchange,
				to_routingKey: routingKey,
				error: error instanceof Error ? error.message : "Unknown Error",
			});
			throw error;
		}
	}

	async close(): Promise<void> {
		if (this.connection) {
			await this.connection.close();
		}
		this.cleanup();
	}

	private cleanup() {
		this.channel = null;
		this.connection = null;
		this.assertedExchanges.clear();
	}
}
