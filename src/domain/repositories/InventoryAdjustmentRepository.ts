import type { InventoryAdjustment } from "../entities/InventoryAdjustment";

export interface InventoryAdjustmentRepository {
	append(adjustment: InventoryAdjustment): Promise<void>;
	findByProductId(
		storeId: string,
		productId: string,
		limit: number
	): Promise<InventoryAdjustment[]>;
	/** Every adjustment carrying the reference, oldest first. */
	findByReference(storeId: string, reference: string): Promise<InventoryAdjustment[]>;
}
