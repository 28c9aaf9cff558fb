import type { Refund } from "../entities/Refund";

export interface FindRefundOptions {
	/** Lock the refund row until the surrounding transaction ends. */
	forUpdate?: boolean;
}

export interface RefundRepository {
	findById(storeId: string, id: string, options?: FindRefundOptions): Promise<Refund | null>;
	findByOrderId(storeId: string, orderId: string): Promise<Refund[]>;
	/** Σ amount of every refund recorded against the order. */
	sumAmountByOrderId(storeId: string, orderId: string): Promise<number>;
	save(refund: Refund): Promise<void>;
}
