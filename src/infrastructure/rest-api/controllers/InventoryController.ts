import type { StockLedgerService } from "@application/services/StockLedgerService";
import { type Request, type Response, Router } from "express";
import { NotFoundError, ValidationError } from "@/domain/errors/DomainError";
import {
	toAdjustmentHttpResponse,
	toLowStockAlertHttpResponse,
	toStockHttpResponse,
} from "../dto/HttpResponses";
import {
	BulkInventoryUpdateRequest,
	InventoryAdjustmentRequest,
	LowStockAlertsQuery,
} from "../dto/InventoryRequests";
import { actorOf, asyncHandler } from "../middleware/asyncHandler";
import { validateBody, validateQuery } from "../middleware/validation";

const MAX_HISTORY_LIMIT = 500;

const parseLimit = (raw: unknown): number | undefined => {
	if (raw === undefined) return undefined;
	const limit = typeof raw === "string" ? Number(raw) : Number.NaN;
	if (!Number.isInteger(limit) || limit <= 0 || limit > MAX_HISTORY_LIMIT) {
		throw new ValidationError(`limit must be an integer between 1 and ${MAX_HISTORY_LIMIT}`);
	}
	return limit;
};

export class InventoryController {
	constructor(private readonly stockLedger: StockLedgerService) {}

	public routes(): Router {
		const router = Router();
		router.post(
			"/stores/:storeId/inventory/adjustments",
			asyncHandler((req, res) => this.recordAdjustment(req, res))
		);
		router.put(
			"/stores/:storeId/inventory/bulk",
			asyncHandler((req, res) => this.bulkUpdate(req, res))
		);
		router.get(
			"/stores/:storeId/inventory/low-stock",
			asyncHandler((req, res) => this.getLowStockAlerts(req, res))
		);
		router.get(
			"/stores/:storeId/inventory/:productId",
			asyncHandler((req, res) => this.getStock(req, res))
		);
		router.get(
			"/stores/:storeId/inventory/:productId/adjustments",
			asyncHandler((req, res) => this.getAdjustmentHistory(req, res))
		);
		return router;
	}

	private async getStock(req: Request, res: Response): Promise<void> {
		const { storeId, productId } = req.params;
		const stock = await this.stockLedger.getStock(storeId, productId);
		if (!stock) {
			throw new NotFoundError("Product", productId);
		}
		res.status(200).json(toStockHttpResponse(stock));
	}

	private async getLowStockAlerts(req: Request, res: Response): Promise<void> {
		const query = await validateQuery(LowStockAlertsQuery, req.query);
		const alerts = await this.stockLedger.getLowStockAlerts(req.params.storeId, query);
		res.status(200).json(alerts.map(toLowStockAlertHttpResponse));
	}

	private async getAdjustmentHistory(req: Request, res: Response): Promise<void> {
		const { storeId, productId } = req.params;
		const history = await this.stockLedger.getAdjustmentHistory(
			storeId,
			productId,
			parseLimit(req.query.limit)
		);
		res.status(200).json(history.map(toAdjustmentHttpResponse));
	}

	private async recordAdjustment(req: Request, res: Response): Promise<void> {
		const body = await validateBody(InventoryAdjustmentRequest, req.body);
		const { stock, adjustment } = await this.stockLedger.recordAdjustment(
			req.params.storeId,
			body,
			actorOf(req)
		);
		res.status(201).json({
			stock: toStockHttpResponse(stock),
			adjustment: toAdjustmentHttpResponse(adjustment),
		});
	}

	private async bulkUpdate(req: Request, res: Response): Promise<void> {
		const body = await validateBody(BulkInventoryUpdateRequest, req.body);
		const results = await this.stockLedger.bulkUpdate(
			req.params.storeId,
			body.updates,
			actorOf(req)
		);
		res.status(200).json(
			results.map(({ stock, adjustment }) => ({
				stock: toStockHttpResponse(stock),
				adjustment: toAdjustmentHttpResponse(adjustment),
			}))
		);
	}
}
