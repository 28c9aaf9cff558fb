import { Type } from "class-transformer";
import {
	ArrayNotEmpty,
	IsArray,
	IsEnum,
	IsInt,
	IsNotEmpty,
	IsOptional,
	IsString,
	Max,
	Min,
	ValidateNested,
} from "class-validator";
import { AdjustmentType } from "@/domain/entities/InventoryAdjustment";
import { StockUrgency } from "@/domain/lowStockAlerts";

export class InventoryAdjustmentRequest {
	@IsString()
	@IsNotEmpty()
	productId!: string;

	@IsEnum(AdjustmentType)
	type!: AdjustmentType;

	@IsInt()
	@Min(0)
	quantity!: number;

	@IsString()
	@IsNotEmpty()
	reason!: string;

	@IsOptional()
	@IsString()
	reference?: string;

	@IsOptional()
	@IsString()
	notes?: string;
}

export class BulkInventoryItemRequest {
	@IsString()
	@IsNotEmpty()
	productId!: string;

	@IsInt()
	@Min(0)
	quantity!: number;

	@IsOptional()
	@IsInt()
	@Min(0)
	lowStockThreshold?: number;
}

export class BulkInventoryUpdateRequest {
	@IsArray()
	@ArrayNotEmpty()
	@ValidateNested({ each: true })
	@Type(() => BulkInventoryItemRequest)
	updates!: BulkInventoryItemRequest[];
}

export class LowStockAlertsQuery {
	@IsOptional()
	@Type(() => Number)
	@IsInt()
	@Min(1)
	@Max(500)
	limit?: number;

	@IsOptional()
	@IsEnum(StockUrgency)
	urgency?: StockUrgency;
}
