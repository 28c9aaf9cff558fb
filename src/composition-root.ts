import { OrderFulfillmentSaga } from "./application/order/OrderFulfillmentSaga";
import { DefaultPricingPolicy } from "./application/services/DefaultPricingPolicy";
import { OrderService } from "./application/services/OrderService";
import { OutboxEventRecorder } from "./application/services/OutboxEventRecorder";
import { RefundCalculator } from "./application/services/RefundCalculator";
import { ReservationService } from "./application/services/ReservationService";
import { StockLedgerService } from "./application/services/StockLedgerService";
import { CancelOrderUseCase } from "./application/use-cases/CancelOrderUseCase";
import { CountOrdersByStatusUseCase } from "./application/use-cases/CountOrdersByStatusUseCase";
import { CreateRefundUseCase } from "./application/use-cases/CreateRefundUseCase";
import { GetOrderByIdUseCase } from "./application/use-cases/GetOrderByIdUseCase";
import { GetOrderByNumberUseCase } from "./application/use-cases/GetOrderByNumberUseCase";
import { GetOrderRefundsUseCase } from "./application/use-cases/GetOrderRefundsUseCase";
import { GetOrdersByCustomerIdUseCase } from "./application/use-cases/GetOrdersByCustomerIdUseCase";
import { GetRefundByIdUseCase } from "./application/use-cases/GetRefundByIdUseCase";
import { ListOrdersUseCase } from "./application/use-cases/ListOrdersUseCase";
import { ProcessRefundUseCase } from "./application/use-cases/ProcessRefundUseCase";
import { UpdateOrderStatusUseCase } from "./application/use-cases/UpdateOrderStatusUseCase";
import { fulfillmentConfig, stockLockConfig } from "./infrastructure/config/config";
import { pool } from "./infrastructure/data-access/postgres/config";
import { PostgresTransactionManager } from "./infrastructure/data-access/postgres/PostgresTransactionManager";
import { PostgreCartProvider } from "./infrastructure/data-access/postgres/repositories/PostgreCartProvider";
import { PostgreCatalogLookup } from "./infrastructure/data-access/postgres/repositories/PostgreCatalogLookup";
import { PostgreInventoryAdjustmentRepository } from "./infrastructure/data-access/postgres/repositories/PostgreInventoryAdjustmentRepository";
import { PostgreOrderRepository } from "./infrastructure/data-access/postgres/repositories/PostgreOrderRepository";
import { PostgreOutboxRepository } from "./infrastructure/data-access/postgres/repositories/PostgreOutboxRepository";
import { PostgreProductStockRepository } from "./infrastructure/data-access/postgres/repositories/PostgreProductStockRepository";
import { PostgreRefundRepository } from "./infrastructure/data-access/postgres/repositories/PostgreRefundRepository";
import { PostgreStockReservationRepository } from "./infrastructure/data-access/postgres/repositories/PostgreStockReservationRepository";
import {
	RedisLeaseStore,
	RedisStockLockManager,
} from "./infrastructure/data-access/redis/RedisStockLockManager";
import { RedisClientProvider } from "./infrastructure/data-access/redis/redis-client.provider";
import { RabbitMQIntegrationEventMapper } from "./infrastructure/events/RabbitMQIntegrationEventMapper";

export interface FulfillmentServices {
	orderService: OrderService;
	stockLedger: StockLedgerService;
	reservationService: ReservationService;
}

export class CompositionRoot {
	static async configure(): Promise<FulfillmentServices> {
		// Db (PostgreSQL)
		const transactionManager = new PostgresTransactionManager(pool);
		const orderRepository = new PostgreOrderRepository();
		const productStockRepository = new PostgreProductStockRepository();
		const adjustmentRepository = new PostgreInventoryAdjustmentRepository();
		const reservationRepository = new PostgreStockReservationRepository();
		const refundRepository = new PostgreRefundRepository();
		const outboxRepository = new PostgreOutboxRepository();
		const cartProvider = new PostgreCartProvider();
		const catalogLookup = new PostgreCatalogLookup();

		// Locks (Redis)
		const redisClient = await RedisClientProvider.getClient();
		const stockLockManager = new RedisStockLockManager(
			new RedisLeaseStore(redisClient),
			stockLockConfig
		);

		// Outbox (published to RabbitMQ by the outbox worker)
		const outboxEventRecorder = new OutboxEventRecorder(
			outboxRepository,
			new RabbitMQIntegrationEventMapper()
		);

		// Services
		const stockLedger = new StockLedgerService(
			productStockRepository,
			adjustmentRepository,
			reservationRepository,
			stockLockManager,
			transactionManager,
			outboxEventRecorder
		);
		const reservationService = new ReservationService(reservationRepository, transactionManager, {
			defaultTtlMinutes: fulfillmentConfig.reservationTtlMinutes,
		});
		const pricingPolicy = new DefaultPricingPolicy({
			taxRate: fulfillmentConfig.taxRate,
			flatShippingAmount: fulfillmentConfig.flatShippingAmount,
		});
		const refundCalculator = new RefundCalculator({
			refundWindowDays: fulfillmentConfig.refundWindowDays,
		});

		const orderFulfillmentSaga = new OrderFulfillmentSaga(
			cartProvider,
			catalogLookup,
			pricingPolicy,
			stockLedger,
			reservationService,
			stockLockManager,
			orderRepository,
			outboxEventRecorder,
			transactionManager,
			{
				currency: fulfillmentConfig.currency,
				reservationTtlMinutes: fulfillmentConfig.reservationTtlMinutes,
			}
		);

		// Use cases
		const cancelOrderUseCase = new CancelOrderUseCase(
			orderRepository,
			adjustmentRepository,
			stockLedger,
			reservationService,
			transactionManager,
			outboxEventRecorder
		);

		const orderService = new OrderService(
			orderFulfillmentSaga,
			new GetOrderByIdUseCase(orderRepository, transactionManager),
			new GetOrderByNumberUseCase(orderRepository, transactionManager),
			new GetOrdersByCustomerIdUseCase(orderRepository, transactionManager),
			new ListOrdersUseCase(orderRepository, transactionManager),
			new CountOrdersByStatusUseCase(orderRepository, transactionManager),
			new UpdateOrderStatusUseCase(
				orderRepository,
				transactionManager,
				outboxEventRecorder,
				cancelOrderUseCase
			),
			cancelOrderUseCase,
			new CreateRefundUseCase(
				orderRepository,
				refundRepository,
				refundCalculator,
				transactionManager,
				outboxEventRecorder
			),
			new ProcessRefundUseCase(refundRepository, transactionManager, outboxEventRecorder),
			new GetOrderRefundsUseCase(orderRepository, refundRepository, transactionManager),
			new GetRefundByIdUseCase(refundRepository, transactionManager)
		);

		return { orderService, stockLedger, reservationService };
	}
}
