import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createApp } from "@/infrastructure/rest-api/app";
import { HealthController } from "@/infrastructure/rest-api/controllers/HealthController";
import { InventoryController } from "@/infrastructure/rest-api/controllers/InventoryController";
import { OrderController } from "@/infrastructure/rest-api/controllers/OrderController";
import { RefundController } from "@/infrastructure/rest-api/controllers/RefundController";
import {
	buildTestContext,
	CUSTOMER_ID,
	SHIPPING_ADDRESS,
	type TestContext,
} from "../../support/context";

describe("HTTP api", () => {
	let ctx: TestContext;
	let server: Server;
	let baseUrl: string;

	const call = (method: string, path: string, body?: unknown, raw?: string) =>
		fetch(`${baseUrl}${path}`, {
			method,
			headers: { "content-type": "application/json", "x-user-id": "clerk-1" },
			body: raw ?? (body === undefined ? undefined : JSON.stringify(body)),
		});

	beforeEach(async () => {
		vi.spyOn(console, "log").mockImplementation(() => {});
		ctx = buildTestContext();
		const app = createApp({
			health: new HealthController(),
			orders: new OrderController(ctx.orderService),
			refunds: new RefundController(ctx.orderService),
			inventory: new InventoryController(ctx.stockLedger),
		});
		server = await new Promise<Server>((resolve) => {
			const listening = app.listen(0, () => resolve(listening));
		});
		const address = server.address();
		if (address === null || typeof address === "string") {
			throw new Error("Server is not listening on a TCP port");
		}
		baseUrl = `http://127.0.0.1:${(address satisfies AddressInfo).port}`;
	});

	afterEach(async () => {
		await new Promise<void>((resolve, reject) =>
			server.close((error) => (error ? reject(error) : resolve()))
		);
	});

	it("answers health checks", async () => {
		const response = await call("GET", "/health");

		expect(response.status).toBe(200);
		expect(await response.json()).toMatchObject({ status: "ok" });
	});

	it("creates an order from a cart and reserves its stock", async () => {
		ctx.seedProduct("P", { quantity: 5 });
		ctx.seedCart("cart-1", [{ productId: "P", quantity: 2, unitPrice: 10 }]);

		const response = await call("POST", "/stores/store-1/orders/from-cart", {
			cartId: "cart-1",
			customerId: CUSTOMER_ID,
			shippingInfo: SHIPPING_ADDRESS,
		});

		expect(response.status).toBe(201);
		const order = await response.json();
		expect(order).toMatchObject({
			store_id: "store-1",
			customer_id: CUSTOMER_ID,
			status: "PENDING",
			subtotal: 20,
			total_amount: 31.99,
			items: [{ product_id: "P", quantity: 2, unit_price: 10, total_price: 20 }],
		});

		const stock = await call("GET", "/stores/store-1/inventory/P");
		expect(await stock.json()).toMatchObject({ product_id: "P", quantity: 3 });

		const history = await call("GET", "/stores/store-1/inventory/P/adjustments?limit=1");
		expect(await history.json()).toMatchObject([
			{ type: "DECREASE", quantity: 2, previous_quantity: 5, new_quantity: 3, adjusted_by: "clerk-1" },
		]);
	});

	it("returns conflicts for insufficient stock", async () => {
		ctx.seedProduct("P", { quantity: 1 });
		ctx.seedCart("cart-1", [{ productId: "P", quantity: 2, unitPrice: 10 }]);

		const response = await call("POST", "/stores/store-1/orders/from-cart", {
			cartId: "cart-1",
			customerId: CUSTOMER_ID,
			shippingInfo: SHIPPING_ADDRESS,
		});

		expect(response.status).toBe(409);
		expect(await response.json()).toEqual({
			code: "INSUFFICIENT_STOCK",
			message: "Insufficient stock for product P: requested 2, available 1",
			retryable: false,
		});
	});

	it("rejects invalid and malformed bodies", async () => {
		const invalid = await call("POST", "/stores/store-1/inventory/adjustments", {
			productId: "P",
			type: "INCREASE",
			quantity: -1,
			reason: "Restock",
		});
		expect(invalid.status).toBe(400);
		expect(await invalid.json()).toEqual({
			code: "VALIDATION_FAILED",
			message: "Request validation failed: quantity must not be less than 0",
			retryable: false,
			details: ["quantity must not be less than 0"],
		});

		const malformed = await call("POST", "/stores/store-1/inventory/adjustments", undefined, "{oops");
		expect(malformed.status).toBe(400);
		expect(await malformed.json()).toMatchObject({ message: "Malformed JSON body" });
	});

	it("maps missing resources and routes to 404", async () => {
		const order = await call("GET", "/stores/store-1/orders/missing");
		expect(order.status).toBe(404);
		expect(await order.json()).toMatchObject({ message: "Order not found: missing" });

		const route = await call("GET", "/nope");
		expect(route.status).toBe(404);
		expect(await route.json()).toMatchObject({ message: "Route not found: GET /nope" });
	});

	it("lists low stock alerts ahead of the product route", async () => {
		ctx.seedProduct("L", { quantity: 1, lowStockThreshold: 4 });
		ctx.seedProduct("Z", { quantity: 0, lowStockThreshold: 2 });
		ctx.seedProduct("OK", { quantity: 10, lowStockThreshold: 2 });

		const response = await call("GET", "/stores/store-1/inventory/low-stock");
		expect(response.status).toBe(200);
		expect(await response.json()).toEqual([
			{
				product_id: "Z",
				product_name: "Product Z",
				sku: "SKU-Z",
				current_stock: 0,
				low_stock_threshold: 2,
				stock_percentage: 0,
				urgency: "CRITICAL",
			},
			{
				product_id: "L",
				product_name: "Product L",
				sku: "SKU-L",
				current_stock: 1,
				low_stock_threshold: 4,
				stock_percentage: 25,
				urgency: "MEDIUM",
			},
		]);

		const medium = await call("GET", "/stores/store-1/inventory/low-stock?urgency=MEDIUM&limit=5");
		expect((await medium.json()).map((alert: { product_id: string }) => alert.product_id)).toEqual([
			"L",
		]);

		const invalid = await call("GET", "/stores/store-1/inventory/low-stock?limit=abc");
		expect(invalid.status).toBe(400);
	});

	it("lists, counts and looks up orders", async () => {
		ctx.seedProduct("P", { quantity: 5 });
		ctx.seedCart("cart-1", [{ productId: "P", quantity: 2, unitPrice: 10 }]);
		const order = await ctx.orderService.createOrderFromCart({
			storeId: "store-1",
			cartId: "cart-1",
			customerId: CUSTOMER_ID,
			shippingInfo: SHIPPING_ADDRESS,
			clearCartAfter: true,
		});

		const counts = await call("GET", "/stores/store-1/orders/status-counts");
		expect(await counts.json()).toEqual({
			PENDING: 1,
			CONFIRMED: 0,
			PROCESSING: 0,
			SHIPPED: 0,
			DELIVERED: 0,
			CANCELLED: 0,
		});

		const pending = await call("GET", "/stores/store-1/orders?status=PENDING&page=0&size=10");
		expect(pending.status).toBe(200);
		expect(await pending.json()).toMatchObject([{ id: order.getId() }]);

		const shipped = await call("GET", "/stores/store-1/orders?status=SHIPPED");
		expect(await shipped.json()).toEqual([]);

		const byNumber = await call(
			"GET",
			`/stores/store-1/orders/by-number/${order.getOrderNumber()}`
		);
		expect(await byNumber.json()).toMatchObject({
			id: order.getId(),
			order_number: order.getOrderNumber(),
		});

		const secondPage = await call(
			"GET",
			`/stores/store-1/customers/${CUSTOMER_ID}/orders?page=1&size=1`
		);
		expect(await secondPage.json()).toEqual([]);

		const badSize = await call("GET", "/stores/store-1/orders?size=0");
		expect(badSize.status).toBe(400);
		const badStatus = await call("GET", "/stores/store-1/orders?status=LOST");
		expect(badStatus.status).toBe(400);
	});

	it("bounds the adjustment history limit", async () => {
		const response = await call("GET", "/stores/store-1/inventory/P/adjustments?limit=0");

		expect(response.status).toBe(400);
		expect(await response.json()).toMatchObject({
			message: "limit must be an integer between 1 and 500",
		});
	});
});
