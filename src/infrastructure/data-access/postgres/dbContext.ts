import { AsyncLocalStorage } from "node:async_hooks";
import type { PoolClient } from "pg";

interface DbScope {
	client: PoolClient;
	inTransaction: boolean;
}

const storage = new AsyncLocalStorage<DbScope>();

/** The connection of the current unit of work, carried across awaits. */
export class DbContext {
	static run<T>(client: PoolClient, work: () => Promise<T>, inTransaction = false): Promise<T> {
		return storage.run({ client, inTransaction }, work);
	}

	static getClient(): PoolClient {
		const scope = storage.getStore();
		if (!scope) {
			throw new Error("NO_DB_CLIENT_IN_CONTEXT");
		}
		return scope.client;
	}

	static hasClient(): boolean {
		return storage.getStore() !== undefined;
	}

	static isInTransaction(): boolean {
		return storage.getStore()?.inTransaction ?? false;
	}
}
