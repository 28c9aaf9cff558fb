import { v7 as uuid } from "uuid";
import type { StockLockManager } from "@/application/ports/StockLockManager";
import { StockLockTimeoutError } from "@/domain/errors/DomainError";
import { sleep } from "../../utils";
import type { RedisClient } from "./redis-client.provider";

export interface StockLockOptions {
	/** Lease length; a crashed holder loses the lock after this. */
	leaseTtlMs: number;
	/** Longest time to wait for one product's lease. */
	waitMs: number;
	retryDelayMs: number;
}

/** Single-key leases owned by a token. */
export interface LeaseStore {
	/** True when the key was free and now holds `token` for `ttlMs`. */
	tryAcquire(key: string, token: string, ttlMs: number): Promise<boolean>;
	/** Drops the key only while it still holds `token`. */
	release(key: string, token: string): Promise<void>;
}

// Deletes the key only while it still holds our token.
const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
else
  return 0
end
`;

export class RedisLeaseStore implements LeaseStore {
	constructor(private readonly redisClient: RedisClient) {}

	async tryAcquire(key: string, token: string, ttlMs: number): Promise<boolean> {
		const result = await this.redisClient.set(key, token, { NX: true, PX: ttlMs });
		return result === "OK";
	}

	async release(key: string, token: string): Promise<void> {
		await this.redisClient.eval(RELEASE_SCRIPT, { keys: [key], arguments: [token] });
	}
}

export class RedisStockLockManager implements StockLockManager {
	constructor(
		private readonly leaseStore: LeaseStore,
		private readonly options: StockLockOptions
	) {}

	async withProductLocks<T>(
		storeId: string,
		productIds: string[],
		work: () => Promise<T>
	): Promise<T> {
		const token = uuid();
		const sortedIds = [...new Set(productIds)].sort();
		const acquired: string[] = [];

		try {
			for (const productId of sortedIds) {
				const key = this.getKey(storeId, productId);
				await this.acquire(key, token, productId);
				acquired.push(key);
			}

			return await work();
		} finally {
			for (const key of acquired.reverse()) {
				await this.release(key, token);
			}
		}
	}

	private getKey(storeId: string, productId: string): string {
		return `stock-lock:${storeId}:${productId}`;
	}

	private async acquire(key: string, token: string, productId: string): Promise<void> {
		const deadline = Date.now() + this.options.waitMs;

		while (true) {
			if (await this.leaseStore.tryAcquire(key, token, this.options.leaseTtlMs)) return;

			if (Date.now() >= deadline) {
				throw new StockLockTimeoutError(productId, this.options.waitMs);
			}
			await sleep(this.options.retryDelayMs);
		}
	}

	private async release(key: string, token: string): Promise<void> {
		try {
			await this.leaseStore.release(key, token);
		} catch (error) {
			console.error(`[StockLock] Could not release ${key}; lease will expire:`, error);
		}
	}
}
