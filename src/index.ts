import "reflect-metadata";

import { CompositionRoot } from "./composition-root";
import { serverConfig } from "./infrastructure/config/config";
import { HealthController } from "./infrastructure/rest-api/controllers/HealthController";
import { InventoryController } from "./infrastructure/rest-api/controllers/InventoryController";
import { OrderController } from "./infrastructure/rest-api/controllers/OrderController";
import { RefundController } from "./infrastructure/rest-api/controllers/RefundController";
import { createApp } from "./infrastructure/rest-api/app";

async function start() {
	try {
		const { orderService, stockLedger } = await CompositionRoot.configure();

		const app = createApp({
			health: new HealthController(),
			orders: new OrderController(orderService),
			refunds: new RefundController(orderService),
			inventory: new InventoryController(stockLedger),
		});

		app.listen(serverConfig.port, () => {
			console.log(`Server is running on port ${serverConfig.port}`);
		});
	} catch (error) {
		console.error("Failed to start application:", error);
		process.exit(1);
	}
}

void start();
