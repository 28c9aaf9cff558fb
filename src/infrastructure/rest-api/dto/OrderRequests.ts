import { Type } from "class-transformer";
import {
	IsBoolean,
	IsDateString,
	IsEmail,
	IsEnum,
	IsInt,
	IsNotEmpty,
	IsOptional,
	IsString,
	Max,
	MaxLength,
	Min,
	ValidateNested,
} from "class-validator";
import { OrderStatus } from "@/domain/entities/Order";

export class AddressRequest {
	@IsString()
	@IsNotEmpty()
	firstName!: string;

	@IsString()
	@IsNotEmpty()
	lastName!: string;

	@IsString()
	@IsNotEmpty()
	address1!: string;

	@IsOptional()
	@IsString()
	address2?: string;

	@IsString()
	@IsNotEmpty()
	city!: string;

	@IsOptional()
	@IsString()
	state?: string;

	@IsString()
	@IsNotEmpty()
	postalCode!: string;

	@IsString()
	@IsNotEmpty()
	country!: string;

	@IsOptional()
	@IsString()
	phone?: string;

	@IsOptional()
	@IsEmail()
	email?: string;
}

export class CreateOrderFromCartRequest {
	@IsString()
	@IsNotEmpty()
	cartId!: string;

	@IsString()
	@IsNotEmpty()
	customerId!: string;

	@ValidateNested()
	@Type(() => AddressRequest)
	shippingInfo!: AddressRequest;

	@IsOptional()
	@ValidateNested()
	@Type(() => AddressRequest)
	billingInfo?: AddressRequest;

	@IsOptional()
	@IsBoolean()
	clearCartAfter?: boolean;

	@IsOptional()
	@IsString()
	@IsNotEmpty()
	attemptId?: string;

	@IsOptional()
	@IsString()
	promoCode?: string;

	@IsOptional()
	@IsString()
	@MaxLength(1000)
	notes?: string;
}

export class UpdateOrderStatusRequest {
	@IsEnum(OrderStatus)
	status!: OrderStatus;
}

export class CancelOrderRequest {
	@IsString()
	@IsNotEmpty()
	reason!: string;
}

export class OrderMilestoneRequest {
	@IsOptional()
	@IsDateString()
	at?: string;
}

export const MAX_PAGE_SIZE = 100;

export class OrderPageQuery {
	@IsOptional()
	@Type(() => Number)
	@IsInt()
	@Min(0)
	page?: number;

	@IsOptional()
	@Type(() => Number)
	@IsInt()
	@Min(1)
	@Max(MAX_PAGE_SIZE)
	size?: number;
}

export class ListOrdersQuery extends OrderPageQuery {
	@IsOptional()
	@IsEnum(OrderStatus)
	status?: OrderStatus;
}
