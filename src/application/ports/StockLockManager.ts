export interface StockLockManager {
	/**
	 * Holds an exclusive lease on every listed product of the store while `work`
	 * runs. Leases are taken in sorted product order and waits are bounded.
	 */
	withProductLocks<T>(
		storeId: string,
		productIds: string[],
		work: () => Promise<T>
	): Promise<T>;
}
