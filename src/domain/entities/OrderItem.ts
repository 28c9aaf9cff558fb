import { v7 as uuid } from "uuid";
import { multiplyMoney } from "../money";

export interface OrderItemProps {
	id: string;
	orderId: string;
	productId: string;
	productName: string;
	productSku: string | null;
	quantity: number;
	unitPrice: number;
	totalPrice: number;
}

/**
 * A priced order line. Name, sku and prices are frozen at order creation and
 * never follow later catalog changes.
 */
export class OrderItem {
	static create(
		orderId: string,
		line: {
			productId: string;
			productName: string;
			productSku: string | null;
			quantity: number;
			unitPrice: number;
		}
	): OrderItem {
		return new OrderItem({
			id: uuid(),
			orderId,
			productId: line.productId,
			productName: line.productName,
			productSku: line.productSku,
			quantity: line.quantity,
			unitPrice: line.unitPrice,
			totalPrice: multiplyMoney(line.unitPrice, line.quantity),
		});
	}

	static loadOrderItem(props: OrderItemProps): OrderItem {
		return new OrderItem(props);
	}

	private constructor(private readonly props: Readonly<OrderItemProps>) {}

	public getId(): string {
		return this.props.id;
	}

	public getOrderId(): string {
		return this.props.orderId;
	}

	public getProductId(): string {
		return this.props.productId;
	}

	public getProductName(): string {
		return this.props.productName;
	}

	public getProductSku(): string | null {
		return this.props.productSku;
	}

	public getQuantity(): number {
		return this.props.quantity;
	}

	public getUnitPrice(): number {
		return this.props.unitPrice;
	}

	public getTotalPrice(): number {
		return this.props.totalPrice;
	}
}
