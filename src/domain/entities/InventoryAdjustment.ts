import Entity from "./Entity";

export enum AdjustmentType {
	INCREASE = "INCREASE",
	DECREASE = "DECREASE",
	SET = "SET",
}

export const isAdjustmentType = (value: string): value is AdjustmentType =>
	Object.values<string>(AdjustmentType).includes(value);

export interface InventoryAdjustmentProps {
	storeId: string;
	productId: string;
	type: AdjustmentType;
	quantity: number;
	previousQuantity: number;
	newQuantity: number;
	reason: string;
	reference: string | null;
	notes: string | null;
	adjustedBy: string;
	adjustedAt: Date;
}

/** Append-only audit row; one per stock quantity mutation. */
export class InventoryAdjustment extends Entity {
	static record(props: InventoryAdjustmentProps): InventoryAdjustment {
		return new InventoryAdjustment(props);
	}

	static loadInventoryAdjustment(
		id: string,
		props: InventoryAdjustmentProps
	): InventoryAdjustment {
		return new InventoryAdjustment(props, id);
	}

	private constructor(
		private readonly props: Readonly<InventoryAdjustmentProps>,
		id?: string
	) {
		super(id);
	}

	public getStoreId(): string {
		return this.props.storeId;
	}

	public getProductId(): string {
		return this.props.productId;
	}

	public getType(): AdjustmentType {
		return this.props.type;
	}

	public getQuantity(): number {
		return this.props.quantity;
	}

	public getPreviousQuantity(): number {
		return this.props.previousQuantity;
	}

	public getNewQuantity(): number {
		return this.props.newQuantity;
	}

	public getDelta(): number {
		return this.props.newQuantity - this.props.previousQuantity;
	}

	public getReason(): string {
		return this.props.reason;
	}

	public getReference(): string | null {
		return this.props.reference;
	}

	public getNotes(): string | null {
		return this.props.notes;
	}

	public getAdjustedBy(): string {
		return this.props.adjustedBy;
	}

	public getAdjustedAt(): Date {
		return this.props.adjustedAt;
	}
}
