import {
	Refund,
	type RefundItem,
	type RefundStatus,
	type RefundType,
} from "@domain/entities/Refund";
import { errorMessage } from "@domain/errors/DomainError";
import type {
	FindRefundOptions,
	RefundRepository,
} from "@domain/repositories/RefundRepository";
import { saveStructures } from "../bulkOperations";
import { DbContext } from "../dbContext";

type RefundRow = {
	refunds_id: string;
	refunds_store_id: string;
	refunds_refund_number: string;
	refunds_order_id: string;
	refunds_order_number: string;
	refunds_refund_type: RefundType;
	refunds_status: RefundStatus;
	refunds_amount: string;
	refunds_processed_amount: string | null;
	refunds_reason: string;
	refunds_refund_method: string | null;
	refunds_notes: string | null;
	refunds_items: RefundItem[];
	refunds_requested_at: Date;
	refunds_processed_at: Date | null;
};

export class PostgreRefundRepository implements RefundRepository {
	static refundSql = `
  refunds.id AS refunds_id,
  refunds.store_id AS refunds_store_id,
  refunds.refund_number AS refunds_refund_number,
  refunds.order_id AS refunds_order_id,
  refunds.order_number AS refunds_order_number,
  refunds.refund_type AS refunds_refund_type,
  refunds.status AS refunds_status,
  refunds.amount AS refunds_amount,
  refunds.processed_amount AS refunds_processed_amount,
  refunds.reason AS refunds_reason,
  refunds.refund_method AS refunds_refund_method,
  refunds.notes AS refunds_notes,
  refunds.items AS refunds_items,
  refunds.requested_at AS refunds_requested_at,
  refunds.processed_at AS refunds_processed_at
`;

	private loadRefund(row: RefundRow): Refund {
		return Refund.loadRefund({
			id: row.refunds_id,
			storeId: row.refunds_store_id,
			refundNumber: row.refunds_refund_number,
			orderId: row.refunds_order_id,
			orderNumber: row.refunds_order_number,
			type: row.refunds_refund_type,
			status: row.refunds_status,
			amount: Number(row.refunds_amount),
			processedAmount:
				row.refunds_processed_amount === null ? null : Number(row.refunds_processed_amount),
			reason: row.refunds_reason,
			refundMethod: row.refunds_refund_method,
			notes: row.refunds_notes,
			items: row.refunds_items,
			requestedAt: row.refunds_requested_at,
			processedAt: row.refunds_processed_at,
		});
	}

	private getRefundDbStructure(refund: Refund) {
		return {
			id: refund.getId(),
			store_id: refund.getStoreId(),
			refund_number: refund.getRefundNumber(),
			order_id: refund.getOrderId(),
			order_number: refund.getOrderNumber(),
			refund_type: refund.getType(),
			status: refund.getStatus(),
			amount: refund.getAmount(),
			processed_amount: refund.getProcessedAmount(),
			reason: refund.getReason(),
			refund_method: refund.getRefundMethod(),
			notes: refund.getNotes(),
			items: JSON.stringify(refund.getItems()),
			requested_at: refund.getRequestedAt(),
			processed_at: refund.getProcessedAt(),
		};
	}

	async findById(
		storeId: string,
		id: string,
		options: FindRefundOptions = {}
	): Promise<Refund | null> {
		try {
			const sql = `
    SELECT
      ${PostgreRefundRepository.refundSql}
    FROM fulfillment.refunds
    WHERE refunds.store_id = $1
    AND refunds.id = $2
    ${options.forUpdate ? "FOR UPDATE" : ""}
`;
			const client = DbContext.getClient();
			const { rows, rowCount } = await client.query<RefundRow>(sql, [storeId, id]);

			if (rowCount === 0) {
				return null;
			}
			return this.loadRefund(rows[0]);
		} catch (error) {
			console.error(`Error finding refund ${id}:`, error);
			throw new Error(`Failed to find refund: ${errorMessage(error)}`);
		}
	}

	async findByOrderId(storeId: string, orderId: string): Promise<Refund[]> {
		try {
			const sql = `
    SELECT
      ${PostgreRefundRepository.refundSql}
    FROM fulfillment.refunds
    WHERE refunds.store_id = $1
    AND refunds.order_id = $2
    ORDER BY refunds.requested_at ASC
`;
			const client = DbContext.getClient();
			const { rows } = await client.query<RefundRow>(sql, [storeId, orderId]);
			return rows.map((row) => this.loadRefund(row));
		} catch (error) {
			console.error(`Error finding refunds of order ${orderId}:`, error);
			throw new Error(`Failed to find refunds: ${errorMessage(error)}`);
		}
	}

	async sumAmountByOrderId(storeId: string, orderId: string): Promise<number> {
		try {
			const sql = `
    SELECT COALESCE(SUM(amount), 0) AS total
    FROM fulfillment.refunds
    WHERE store_id = $1
    AND order_id = $2
`;
			const client = DbContext.getClient();
			const { rows } = await client.query<{ total: string }>(sql, [storeId, orderId]);
			return Number(rows[0]?.total ?? 0);
		} catch (error) {
			console.error(`Error summing refunds of order ${orderId}:`, error);
			throw new Error(`Failed to sum refunds: ${errorMessage(error)}`);
		}
	}

	async save(refund: Refund): Promise<void> {
		if (!refund.getWasUpdated()) return;

		try {
			const client = DbContext.getClient();
			await saveStructures([this.getRefundDbStructure(refund)], "fulfillment.refunds", client, {
				touchUpdatedAt: true,
			});
			refund.setWasUpdated(false);
		} catch (error) {
			console.error(`Error saving refund ${refund.getId()}:`, error);
			throw new Error(`Failed to save refund: ${errorMessage(error)}`);
		}
	}
}
