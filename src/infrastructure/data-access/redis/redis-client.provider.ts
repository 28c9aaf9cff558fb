import { createClient } from "redis";
import { redisConfig } from "@/infrastructure/config/config";

export type RedisClient = ReturnType<typeof createClient>;

export class RedisClientProvider {
	private static client: RedisClient | null = null;

	static async getClient(): Promise<RedisClient> {
		if (!RedisClientProvider.client) {
			const client = createClient({ url: redisConfig.url });

			client.on("error", (err) => {
				console.error("Redis Client Error:", err);
			});

			await client.connect();
			RedisClientProvider.client = client;
		}

		return RedisClientProvider.client;
	}

	static async disconnect(): Promise<void> {
		if (RedisClientProvider.client) {
			await RedisClientProvider.client.quit();
			RedisClientProvider.client = null;
		}
	}
}
