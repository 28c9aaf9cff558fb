import type { OrderTotals } from "@/domain/entities/Order";

export interface PricedLine {
	productId: string;
	quantity: number;
	unitPrice: number;
}

export interface PricingRequest {
	storeId: string;
	customerId: string;
	lines: PricedLine[];
	promoCode?: string | null;
}

/** Extension point for external tax, shipping and promotion engines. */
export interface PricingPolicy {
	quote(request: PricingRequest): Promise<OrderTotals>;
}
