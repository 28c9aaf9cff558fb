export type CartStatus = "ACTIVE" | "ABANDONED" | "CONVERTED" | "EXPIRED";

export interface CartLine {
	productId: string;
	quantity: number;
	unitPrice: number;
}

export interface CartSnapshot {
	id: string;
	customerId: string;
	status: CartStatus;
	isActive: boolean;
	isEmpty: boolean;
	isExpired: boolean;
	items: CartLine[];
}

export interface CartProvider {
	getCartById(storeId: string, cartId: string): Promise<CartSnapshot | null>;
	/** Empties the cart and marks it converted. */
	clearCart(storeId: string, cartId: string): Promise<void>;
}
