export interface TransactionManager {
	/** Runs `work` in a database transaction, joining the caller's if there is one. */
	runInTransaction<T>(work: () => Promise<T>): Promise<T>;
	/** Runs `work` with a connection but no transaction, joining any open one. */
	runInSession<T>(work: () => Promise<T>): Promise<T>;
}
