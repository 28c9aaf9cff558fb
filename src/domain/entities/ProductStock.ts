import {
	InsufficientStockError,
	InvalidStateError,
	ValidationError,
} from "../errors/DomainError";
import type { InventoryDomainEvent } from "../events/DomainEvents";
import { InventoryEvents } from "../events/InventoryEvents";
import Entity from "./Entity";
import { AdjustmentType } from "./InventoryAdjustment";

export interface ProductStockProps {
	productId: string;
	storeId: string;
	name: string;
	sku: string | null;
	quantity: number;
	lowStockThreshold: number;
	trackInventory: boolean;
}

export interface QuantityChange {
	previousQuantity: number;
	newQuantity: number;
}

export class ProductStock extends Entity<InventoryDomainEvent> {
	static loadProductStock(props: ProductStockProps): ProductStock {
		return new ProductStock(props);
	}

	private readonly storeId: string;
	private readonly name: string;
	private readonly sku: string | null;
	private quantity: number;
	private lowStockThreshold: number;
	private readonly trackInventory: boolean;
	private wasUpdated: boolean;

	private constructor(props: ProductStockProps) {
		super(props.productId);
		this.storeId = props.storeId;
		this.name = props.name;
		this.sku = props.sku;
		this.quantity = props.quantity;
		this.lowStockThreshold = props.lowStockThreshold;
		this.trackInventory = props.trackInventory;
		this.wasUpdated = false;
	}

	/** Inventory-free products always have enough. */
	public hasSufficientStock(requested: number): boolean {
		if (!this.trackInventory) return true;
		return this.quantity >= requested;
	}

	public applyAdjustment(
		type: AdjustmentType,
		quantity: number,
		now: Date = new Date()
	): QuantityChange {
		if (!this.trackInventory) {
			throw new InvalidStateError(
				`Product ${this.getId()} does not track inventory`
			);
		}
		if (!Number.isInteger(quantity) || quantity < 0) {
			throw new ValidationError(
				`Adjustment quantity must be a non-negative integer, got ${quantity}`
			);
		}
		if (type !== AdjustmentType.SET && quantity === 0) {
			throw new ValidationError(`${type} adjustment quantity must be positive`);
		}

		const previousQuantity = this.quantity;
		const newQuantity = this.computeNewQuantity(type, quantity);

		if (newQuantity < 0) {
			throw new InsufficientStockError(this.getId(), quantity, previousQuantity);
		}

		this.quantity = newQuantity;
		this.wasUpdated = true;

		if (this.isLowStock()) {
			this.addDomainEvent(InventoryEvents.lowStock(this, now));
		}

		return { previousQuantity, newQuantity };
	}

	public changeLowStockThreshold(threshold: number): void {
		if (!Number.isInteger(threshold) || threshold < 0) {
			throw new ValidationError(
				`Low stock threshold must be a non-negative integer, got ${threshold}`
			);
		}
		this.lowStockThreshold = threshold;
		this.wasUpdated = true;
	}

	public isLowStock(): boolean {
		return this.trackInventory && this.quantity <= this.lowStockThreshold;
	}

	private computeNewQuantity(type: AdjustmentType, quantity: number): number {
		switch (type) {
			case AdjustmentType.INCREASE:
				return this.quantity + quantity;
			case AdjustmentType.DECREASE:
				return this.quantity - quantity;
			case AdjustmentType.SET:
				return quantity;
		}
	}

	public getStoreId(): string {
		return this.storeId;
	}

	public getName(): string {
		return this.name;
	}

	public getSku(): string | null {
		return this.sku;
	}

	public getQuantity(): number {
		return this.quantity;
	}

	public getLowStockThreshold(): number {
		return this.lowStockThreshold;
	}

	public isTrackingInventory(): boolean {
		return this.trackInventory;
	}

	public getWasUpdated(): boolean {
		return this.wasUpdated;
	}

	public setWasUpdated(wasUpdated: boolean): void {
		this.wasUpdated = wasUpdated;
	}
}
