import {
	type AdjustmentType,
	InventoryAdjustment,
} from "@domain/entities/InventoryAdjustment";
import { errorMessage } from "@domain/errors/DomainError";
import type { InventoryAdjustmentRepository } from "@domain/repositories/InventoryAdjustmentRepository";
import { insertStructures } from "../bulkOperations";
import { DbContext } from "../dbContext";

type AdjustmentRow = {
	inventory_adjustments_id: string;
	inventory_adjustments_store_id: string;
	inventory_adjustments_product_id: string;
	inventory_adjustments_adjustment_type: AdjustmentType;
	inventory_adjustments_quantity: number;
	inventory_adjustments_previous_quantity: number;
	inventory_adjustments_new_quantity: number;
	inventory_adjustments_reason: string;
	inventory_adjustments_reference: string | null;
	inventory_adjustments_notes: string | null;
	inventory_adjustments_adjusted_by: string;
	inventory_adjustments_adjusted_at: Date;
};

export class PostgreInventoryAdjustmentRepository implements InventoryAdjustmentRepository {
	static adjustmentSql = `
  inventory_adjustments.id AS inventory_adjustments_id,
  inventory_adjustments.store_id AS inventory_adjustments_store_id,
  inventory_adjustments.product_id AS inventory_adjustments_product_id,
  inventory_adjustments.adjustment_type AS inventory_adjustments_adjustment_type,
  inventory_adjustments.quantity AS inventory_adjustments_quantity,
  inventory_adjustments.previous_quantity AS inventory_adjustments_previous_quantity,
  inventory_adjustments.new_quantity AS inventory_adjustments_new_quantity,
  inventory_adjustments.reason AS inventory_adjustments_reason,
  inventory_adjustments.reference AS inventory_adjustments_reference,
  inventory_adjustments.notes AS inventory_adjustments_notes,
  inventory_adjustments.adjusted_by AS inventory_adjustments_adjusted_by,
  inventory_adjustments.adjusted_at AS inventory_adjustments_adjusted_at
`;

	private loadInventoryAdjustment(row: AdjustmentRow): InventoryAdjustment {
		return InventoryAdjustment.loadInventoryAdjustment(row.inventory_adjustments_id, {
			storeId: row.inventory_adjustments_store_id,
			productId: row.inventory_adjustments_product_id,
			type: row.inventory_adjustments_adjustment_type,
			quantity: row.inventory_adjustments_quantity,
			previousQuantity: row.inventory_adjustments_previous_quantity,
			newQuantity: row.inventory_adjustments_new_quantity,
			reason: row.inventory_adjustments_reason,
			reference: row.inventory_adjustments_reference,
			notes: row.inventory_adjustments_notes,
			adjustedBy: row.inventory_adjustments_adjusted_by,
			adjustedAt: row.inventory_adjustments_adjusted_at,
		});
	}

	async append(adjustment: InventoryAdjustment): Promise<void> {
		try {
			const client = DbContext.getClient();
			await insertStructures(
				[
					{
						id: adjustment.getId(),
						store_id: adjustment.getStoreId(),
						product_id: adjustment.getProductId(),
						adjustment_type: adjustment.getType(),
						quantity: adjustment.getQuantity(),
						previous_quantity: adjustment.getPreviousQuantity(),
						new_quantity: adjustment.getNewQuantity(),
						reason: adjustment.getReason(),
						reference: adjustment.getReference(),
						notes: adjustment.getNotes(),
						adjusted_by: adjustment.getAdjustedBy(),
						adjusted_at: adjustment.getAdjustedAt(),
					},
				],
				"fulfillment.inventory_adjustments",
				client
			);
		} catch (error) {
			console.error(`Error appending adjustment for ${adjustment.getProductId()}:`, error);
			throw new Error(`Failed to append inventory adjustment: ${errorMessage(error)}`);
		}
	}

	async findByProductId(
		storeId: string,
		productId: string,
		limit: number
	): Promise<InventoryAdjustment[]> {
		try {
			const sql = `
    SELECT
      ${PostgreInventoryAdjustmentRepository.adjustmentSql}
    FROM fulfillment.inventory_adjustments
    WHERE inventory_adjustments.store_id = $1
    AND inventory_adjustments.product_id = $2
    ORDER BY inventory_adjustments.adjusted_at DESC, inventory_adjustments.id DESC
    LIMIT $3
`;
			const client = DbContext.getClient();
			const { rows } = await client.query<AdjustmentRow>(sql, [storeId, productId, limit]);
			return rows.map((row) => this.loadInventoryAdjustment(row));
		} catch (error) {
			console.error(`Error reading adjustments of product ${productId}:`, error);
			throw new Error(`Failed to read inventory adjustments: ${errorMessage(error)}`);
		}
	}

	async findByReference(storeId: string, reference: string): Promise<InventoryAdjustment[]> {
		try {
			const sql = `
    SELECT
      ${PostgreInventoryAdjustmentRepository.adjustmentSql}
    FROM fulfillment.inventory_adjustments
    WHERE inventory_adjustments.store_id = $1
    AND inventory_adjustments.reference = $2
    ORDER BY inventory_adjustments.adjusted_at ASC, inventory_adjustments.id ASC
`;
			const client = DbContext.getClient();
			const { rows } = await client.query<AdjustmentRow>(sql, [storeId, reference]);
			return rows.map((row) => this.loadInventoryAdjustment(row));
		} catch (error) {
			console.error(`Error reading adjustments with reference ${reference}:`, error);
			throw new Error(`Failed to read inventory adjustments: ${errorMessage(error)}`);
		}
	}
}
