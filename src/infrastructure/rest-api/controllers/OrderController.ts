import type { OrderService } from "@application/services/OrderService";
import { type Request, type Response, Router } from "express";
import { OrderStatus } from "@/domain/entities/Order";
import {
	CancelOrderRequest,
	CreateOrderFromCartRequest,
	ListOrdersQuery,
	OrderMilestoneRequest,
	OrderPageQuery,
	UpdateOrderStatusRequest,
} from "../dto/OrderRequests";
import { toOrderHttpResponse } from "../dto/HttpResponses";
import { actorOf, asyncHandler } from "../middleware/asyncHandler";
import { validateBody, validateQuery } from "../middleware/validation";

export class OrderController {
	constructor(private readonly orderService: OrderService) {}

	public routes(): Router {
		const router = Router();
		router.post(
			"/stores/:storeId/orders/from-cart",
			asyncHandler((req, res) => this.createOrderFromCart(req, res))
		);
		router.get(
			"/stores/:storeId/orders",
			asyncHandler((req, res) => this.listOrders(req, res))
		);
		router.get(
			"/stores/:storeId/orders/status-counts",
			asyncHandler((req, res) => this.countOrdersByStatus(req, res))
		);
		router.get(
			"/stores/:storeId/orders/by-number/:orderNumber",
			asyncHandler((req, res) => this.getOrderByNumber(req, res))
		);
		router.get(
			"/stores/:storeId/orders/:orderId",
			asyncHandler((req, res) => this.getOrderById(req, res))
		);
		router.get(
			"/stores/:storeId/customers/:customerId/orders",
			asyncHandler((req, res) => this.getOrdersByCustomer(req, res))
		);
		router.patch(
			"/stores/:storeId/orders/:orderId/status",
			asyncHandler((req, res) => this.updateStatus(req, res))
		);
		router.post(
			"/stores/:storeId/orders/:orderId/cancel",
			asyncHandler((req, res) => this.cancel(req, res))
		);
		router.post(
			"/stores/:storeId/orders/:orderId/ship",
			asyncHandler((req, res) => this.milestone(req, res, OrderStatus.SHIPPED))
		);
		router.post(
			"/stores/:storeId/orders/:orderId/deliver",
			asyncHandler((req, res) => this.milestone(req, res, OrderStatus.DELIVERED))
		);
		return router;
	}

	private async createOrderFromCart(req: Request, res: Response): Promise<void> {
		const body = await validateBody(CreateOrderFromCartRequest, req.body);

		const order = await this.orderService.createOrderFromCart({
			storeId: req.params.storeId,
			cartId: body.cartId,
			customerId: body.customerId,
			shippingInfo: body.shippingInfo,
			billingInfo: body.billingInfo,
			clearCartAfter: body.clearCartAfter ?? true,
			attemptId: body.attemptId,
			promoCode: body.promoCode,
			notes: body.notes,
			actor: actorOf(req),
		});

		res.status(201).json(toOrderHttpResponse(order));
	}

	private async getOrderById(req: Request, res: Response): Promise<void> {
		const order = await this.orderService.getOrderById(req.params.storeId, req.params.orderId);
		res.status(200).json(toOrderHttpResponse(order));
	}

	private async getOrderByNumber(req: Request, res: Response): Promise<void> {
		const order = await this.orderService.getOrderByNumber(
			req.params.storeId,
			req.params.orderNumber
		);
		res.status(200).json(toOrderHttpResponse(order));
	}

	private async listOrders(req: Request, res: Response): Promise<void> {
		const query = await validateQuery(ListOrdersQuery, req.query);
		const orders = await this.orderService.listOrders(req.params.storeId, query);
		res.status(200).json(orders.map(toOrderHttpResponse));
	}

	private async countOrdersByStatus(req: Request, res: Response): Promise<void> {
		const counts = await this.orderService.countOrdersByStatus(req.params.storeId);
		res.status(200).json(counts);
	}

	private async getOrdersByCustomer(req: Request, res: Response): Promise<void> {
		const query = await validateQuery(OrderPageQuery, req.query);
		const orders = await this.orderService.getOrdersByCustomer(
			req.params.storeId,
			req.params.customerId,
			query
		);
		res.status(200).json(orders.map(toOrderHttpResponse));
	}

	private async updateStatus(req: Request, res: Response): Promise<void> {
		const body = await validateBody(UpdateOrderStatusRequest, req.body);
		const order = await this.orderService.updateStatus(
			req.params.storeId,
			req.params.orderId,
			body.status
		);
		res.status(200).json(toOrderHttpResponse(order));
	}

	private async cancel(req: Request, res: Response): Promise<void> {
		const body = await validateBody(CancelOrderRequest, req.body);
		const order = await this.orderService.cancel(
			req.params.storeId,
			req.params.orderId,
			body.reason,
			actorOf(req)
		);
		res.status(200).json(toOrderHttpResponse(order));
	}

	private async milestone(
		req: Request,
		res: Response,
		status: OrderStatus.SHIPPED | OrderStatus.DELIVERED
	): Promise<void> {
		const body = await validateBody(OrderMilestoneRequest, req.body ?? {});
		const when = body.at ? new Date(body.at) : undefined;
		const order =
			status === OrderStatus.SHIPPED
				? await this.orderService.markShipped(req.params.storeId, req.params.orderId, when)
				: await this.orderService.markDelivered(req.params.storeId, req.params.orderId, when);
		res.status(200).json(toOrderHttpResponse(order));
	}
}
