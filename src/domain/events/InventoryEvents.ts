import type { ProductStock } from "../entities/ProductStock";
import type { InventoryLowStockEvent } from "./DomainEvents";

export class InventoryEvents {
	static lowStock(stock: ProductStock, detectedAt: Date): InventoryLowStockEvent {
		return {
			type: "INVENTORY_LOW_STOCK",
			timestamp: detectedAt,
			storeId: stock.getStoreId(),
			aggregateId: stock.getId(),
			aggregateType: "Product",
			data: {
				productId: stock.getId(),
				quantity: stock.getQuantity(),
				lowStockThreshold: stock.getLowStockThreshold(),
			},
		};
	}
}
