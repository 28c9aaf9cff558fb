import type { OrderService } from "@application/services/OrderService";
import { type Request, type Response, Router } from "express";
import { toRefundHttpResponse } from "../dto/HttpResponses";
import { CreateRefundRequest, ProcessRefundRequest } from "../dto/RefundRequests";
import { asyncHandler } from "../middleware/asyncHandler";
import { validateBody } from "../middleware/validation";

export class RefundController {
	constructor(private readonly orderService: OrderService) {}

	public routes(): Router {
		const router = Router();
		router.post(
			"/stores/:storeId/orders/:orderId/refunds",
			asyncHandler((req, res) => this.createRefund(req, res))
		);
		router.get(
			"/stores/:storeId/orders/:orderId/refunds",
			asyncHandler((req, res) => this.getOrderRefunds(req, res))
		);
		router.get(
			"/stores/:storeId/refunds/:refundId",
			asyncHandler((req, res) => this.getRefundById(req, res))
		);
		router.post(
			"/stores/:storeId/refunds/:refundId/process",
			asyncHandler((req, res) => this.processRefund(req, res))
		);
		return router;
	}

	private async createRefund(req: Request, res: Response): Promise<void> {
		const body = await validateBody(CreateRefundRequest, req.body);
		const refund = await this.orderService.createRefund(req.params.storeId, req.params.orderId, {
			type: body.type,
			amount: body.amount,
			items: body.items,
			reason: body.reason,
			refundMethod: body.refundMethod,
			notes: body.notes,
		});
		res.status(201).json(toRefundHttpResponse(refund));
	}

	private async getOrderRefunds(req: Request, res: Response): Promise<void> {
		const refunds = await this.orderService.getOrderRefunds(
			req.params.storeId,
			req.params.orderId
		);
		res.status(200).json(refunds.map(toRefundHttpResponse));
	}

	private async getRefundById(req: Request, res: Response): Promise<void> {
		const refund = await this.orderService.findRefund(req.params.storeId, req.params.refundId);
		res.status(200).json(toRefundHttpResponse(refund));
	}

	private async processRefund(req: Request, res: Response): Promise<void> {
		const body = await validateBody(ProcessRefundRequest, req.body);
		const refund = await this.orderService.processRefund(
			req.params.storeId,
			req.params.refundId,
			body.processedAmount,
			body.notes
		);
		res.status(200).json(toRefundHttpResponse(refund));
	}
}
