import type { OrderTotals } from "@/domain/entities/Order";
import { fromCents, toCents } from "@/domain/money";
import type { PricingPolicy, PricingRequest } from "../ports/PricingPolicy";

export interface PricingOptions {
	taxRate: number;
	flatShippingAmount: number;
}

type PromoRule = (subtotalCents: number) => number | null;

const PROMO_CODES: Record<string, PromoRule> = {
	VIP10: (subtotal) => Math.round(subtotal * 0.1),
	WELCOME5: (subtotal) => Math.round(subtotal * 0.05),
	SAVE20: () => 2000,
	BULK15: (subtotal) => (subtotal >= 10_000 ? Math.round(subtotal * 0.15) : null),
};

// Highest threshold first.
const VOLUME_TIERS = [
	{ minSubtotalCents: 50_000, rate: 0.1 },
	{ minSubtotalCents: 20_000, rate: 0.05 },
];

export class DefaultPricingPolicy implements PricingPolicy {
	constructor(
		private readonly options: PricingOptions = { taxRate: 0.1, flatShippingAmount: 9.99 }
	) {}

	async quote(request: PricingRequest): Promise<OrderTotals> {
		const subtotal = request.lines.reduce(
			(total, line) => total + toCents(line.unitPrice) * line.quantity,
			0
		);
		const discount = Math.min(this.discountFor(subtotal, request.promoCode), subtotal);
		const tax = Math.round((subtotal - discount) * this.options.taxRate);
		const shipping = toCents(this.options.flatShippingAmount);

		return {
			subtotal: fromCents(subtotal),
			discountAmount: fromCents(discount),
			taxAmount: fromCents(tax),
			shippingAmount: fromCents(shipping),
			totalAmount: fromCents(subtotal - discount + tax + shipping),
		};
	}

	private discountFor(subtotalCents: number, promoCode?: string | null): number {
		const rule = promoCode ? PROMO_CODES[promoCode.trim().toUpperCase()] : undefined;
		const promoDiscount = rule ? rule(subtotalCents) : null;
		if (promoDiscount !== null) return promoDiscount;

		const tier = VOLUME_TIERS.find((tier) => subtotalCents >= tier.minSubtotalCents);
		return tier ? Math.round(subtotalCents * tier.rate) : 0;
	}
}
