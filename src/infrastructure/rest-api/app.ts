import cors from "cors";
import express, { type Express } from "express";
import { NotFoundError } from "@/domain/errors/DomainError";
import type { HealthController } from "./controllers/HealthController";
import type { InventoryController } from "./controllers/InventoryController";
import type { OrderController } from "./controllers/OrderController";
import type { RefundController } from "./controllers/RefundController";
import { errorHandler } from "./middleware/errorHandler";

export interface HttpControllers {
	health: HealthController;
	orders: OrderController;
	refunds: RefundController;
	inventory: InventoryController;
}

export const createApp = (controllers: HttpControllers): Express => {
	const app = express();

	app.use(cors());
	app.use(express.json());

	app.use(controllers.health.routes());
	app.use(controllers.orders.routes());
	app.use(controllers.refunds.routes());
	app.use(controllers.inventory.routes());

	app.use((req, _res, next) => {
		next(new NotFoundError("Route", `${req.method} ${req.path}`));
	});
	app.use(errorHandler);

	return app;
};
