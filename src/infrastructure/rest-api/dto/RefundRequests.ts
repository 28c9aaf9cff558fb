import { Type } from "class-transformer";
import {
	ArrayNotEmpty,
	IsArray,
	IsEnum,
	IsInt,
	IsNotEmpty,
	IsNumber,
	IsOptional,
	IsPositive,
	IsString,
	Min,
	ValidateNested,
} from "class-validator";
import { RefundType } from "@/domain/entities/Refund";

export class RefundItemRequest {
	@IsString()
	@IsNotEmpty()
	orderItemId!: string;

	@IsInt()
	@Min(1)
	quantity!: number;
}

export class CreateRefundRequest {
	@IsEnum(RefundType)
	type!: RefundType;

	@IsOptional()
	@IsNumber({ maxDecimalPlaces: 2 })
	@IsPositive()
	amount?: number;

	@IsOptional()
	@IsArray()
	@ArrayNotEmpty()
	@ValidateNested({ each: true })
	@Type(() => RefundItemRequest)
	items?: RefundItemRequest[];

	@IsString()
	@IsNotEmpty()
	reason!: string;

	@IsOptional()
	@IsString()
	refundMethod?: string;

	@IsOptional()
	@IsString()
	notes?: string;
}

export class ProcessRefundRequest {
	@IsNumber({ maxDecimalPlaces: 2 })
	@IsPositive()
	processedAmount!: number;

	@IsOptional()
	@IsString()
	notes?: string;
}
