import { describe, expect, it } from "vitest";
import { AdjustmentType } from "@/domain/entities/InventoryAdjustment";
import { ProductStock, type ProductStockProps } from "@/domain/entities/ProductStock";
import {
	InsufficientStockError,
	InvalidStateError,
	ValidationError,
} from "@/domain/errors/DomainError";

const stockOf = (overrides: Partial<ProductStockProps> = {}): ProductStock =>
	ProductStock.loadProductStock({
		productId: "p-1",
		storeId: "store-1",
		name: "Mug",
		sku: "MUG-1",
		quantity: 5,
		lowStockThreshold: 2,
		trackInventory: true,
		...overrides,
	});

describe("ProductStock", () => {
	it("applies increase, decrease and set adjustments", () => {
		const stock = stockOf();

		expect(stock.applyAdjustment(AdjustmentType.INCREASE, 3)).toEqual({
			previousQuantity: 5,
			newQuantity: 8,
		});
		expect(stock.applyAdjustment(AdjustmentType.DECREASE, 4)).toEqual({
			previousQuantity: 8,
			newQuantity: 4,
		});
		expect(stock.applyAdjustment(AdjustmentType.SET, 0)).toEqual({
			previousQuantity: 4,
			newQuantity: 0,
		});
		expect(stock.getWasUpdated()).toBe(true);
	});

	it("refuses to go below zero", () => {
		const stock = stockOf({ quantity: 2 });

		expect(() => stock.applyAdjustment(AdjustmentType.DECREASE, 3)).toThrow(
			InsufficientStockError
		);
		expect(stock.getQuantity()).toBe(2);
	});

	it("rejects zero and fractional quantities", () => {
		const stock = stockOf();

		expect(() => stock.applyAdjustment(AdjustmentType.INCREASE, 0)).toThrow(ValidationError);
		expect(() => stock.applyAdjustment(AdjustmentType.DECREASE, 1.5)).toThrow(ValidationError);
		expect(() => stock.applyAdjustment(AdjustmentType.SET, -1)).toThrow(ValidationError);
	});

	it("does not adjust products that skip inventory tracking", () => {
		const stock = stockOf({ trackInventory: false, quantity: 0 });

		expect(() => stock.applyAdjustment(AdjustmentType.INCREASE, 1)).toThrow(InvalidStateError);
		expect(stock.hasSufficientStock(1_000)).toBe(true);
	});

	it("raises a low stock event once the threshold is reached", () => {
		const stock = stockOf({ quantity: 5, lowStockThreshold: 2 });

		stock.applyAdjustment(AdjustmentType.DECREASE, 2);
		expect(stock.hasPendingEvents()).toBe(false);

		stock.applyAdjustment(AdjustmentType.DECREASE, 1);
		const [event] = stock.pullDomainEvents();
		expect(event).toMatchObject({
			type: "INVENTORY_LOW_STOCK",
			aggregateId: "p-1",
			data: { productId: "p-1", quantity: 2, lowStockThreshold: 2 },
		});
	});
});
