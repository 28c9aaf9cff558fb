import type { ProductStock } from "./entities/ProductStock";

export enum StockUrgency {
	CRITICAL = "CRITICAL",
	HIGH = "HIGH",
	MEDIUM = "MEDIUM",
	LOW = "LOW",
}

const URGENCY_RANK: Record<StockUrgency, number> = {
	[StockUrgency.CRITICAL]: 0,
	[StockUrgency.HIGH]: 1,
	[StockUrgency.MEDIUM]: 2,
	[StockUrgency.LOW]: 3,
};

export interface LowStockAlert {
	productId: string;
	productName: string;
	sku: string | null;
	currentStock: number;
	lowStockThreshold: number;
	/** Whole percent of the threshold still on hand, 0 to 100. */
	stockPercentage: number;
	urgency: StockUrgency;
}

export interface LowStockAlertQuery {
	limit?: number;
	/** Keep only alerts of this urgency. */
	urgency?: StockUrgency;
}

export const DEFAULT_LOW_STOCK_ALERT_LIMIT = 50;

export const stockPercentage = (currentStock: number, threshold: number): number => {
	if (threshold <= 0) {
		return currentStock > 0 ? 100 : 0;
	}
	const percentage = Math.floor((currentStock * 100) / threshold);
	return Math.min(100, Math.max(0, percentage));
};

export const urgencyOf = (currentStock: number, percentage: number): StockUrgency => {
	if (currentStock <= 0) return StockUrgency.CRITICAL;
	if (percentage < 25) return StockUrgency.HIGH;
	if (percentage < 50) return StockUrgency.MEDIUM;
	return StockUrgency.LOW;
};

export const toLowStockAlert = (stock: ProductStock): LowStockAlert => {
	const currentStock = stock.getQuantity();
	const percentage = stockPercentage(currentStock, stock.getLowStockThreshold());

	return {
		productId: stock.getId(),
		productName: stock.getName(),
		sku: stock.getSku(),
		currentStock,
		lowStockThreshold: stock.getLowStockThreshold(),
		stockPercentage: percentage,
		urgency: urgencyOf(currentStock, percentage),
	};
};

/** Most urgent first, then lowest percentage; cut to the limit. */
export const rankLowStockAlerts = (
	alerts: LowStockAlert[],
	query: LowStockAlertQuery = {}
): LowStockAlert[] =>
	alerts
		.filter((alert) => query.urgency === undefined || alert.urgency === query.urgency)
		.sort(
			(a, b) =>
				URGENCY_RANK[a.urgency] - URGENCY_RANK[b.urgency] ||
				a.stockPercentage - b.stockPercentage
		)
		.slice(0, query.limit ?? DEFAULT_LOW_STOCK_ALERT_LIMIT);
