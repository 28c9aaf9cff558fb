import { OrderFulfillmentSaga } from "@/application/order/OrderFulfillmentSaga";
import { DefaultPricingPolicy } from "@/application/services/DefaultPricingPolicy";
import { OrderService } from "@/application/services/OrderService";
import { OutboxEventRecorder } from "@/application/services/OutboxEventRecorder";
import { RefundCalculator } from "@/application/services/RefundCalculator";
import { ReservationService } from "@/application/services/ReservationService";
import { StockLedgerService } from "@/application/services/StockLedgerService";
import { CancelOrderUseCase } from "@/application/use-cases/CancelOrderUseCase";
import { CountOrdersByStatusUseCase } from "@/application/use-cases/CountOrdersByStatusUseCase";
import { CreateRefundUseCase } from "@/application/use-cases/CreateRefundUseCase";
import { GetOrderByIdUseCase } from "@/application/use-cases/GetOrderByIdUseCase";
import { GetOrderByNumberUseCase } from "@/application/use-cases/GetOrderByNumberUseCase";
import { GetOrderRefundsUseCase } from "@/application/use-cases/GetOrderRefundsUseCase";
import { GetOrdersByCustomerIdUseCase } from "@/application/use-cases/GetOrdersByCustomerIdUseCase";
import { GetRefundByIdUseCase } from "@/application/use-cases/GetRefundByIdUseCase";
import { ListOrdersUseCase } from "@/application/use-cases/ListOrdersUseCase";
import { ProcessRefundUseCase } from "@/application/use-cases/ProcessRefundUseCase";
import { UpdateOrderStatusUseCase } from "@/application/use-cases/UpdateOrderStatusUseCase";
import type { AddressSnapshot } from "@/domain/entities/Order";
import { RabbitMQIntegrationEventMapper } from "@/infrastructure/events/RabbitMQIntegrationEventMapper";
import {
	type CartRow,
	InMemoryDatabase,
	InMemoryStockLockManager,
	InMemoryTransactionManager,
	type ProductRow,
	rowKey,
} from "./InMemoryDatabase";
import {
	InMemoryCartProvider,
	InMemoryCatalogLookup,
	InMemoryInventoryAdjustmentRepository,
	InMemoryOrderRepository,
	InMemoryOutboxRepository,
	InMemoryProductStockRepository,
	InMemoryRefundRepository,
	InMemoryStockReservationRepository,
} from "./InMemoryRepositories";

export const STORE_ID = "store-1";
export const CUSTOMER_ID = "customer-1";

export const SHIPPING_ADDRESS: AddressSnapshot = {
	firstName: "Ada",
	lastName: "Tester",
	address1: "1 Test Street",
	city: "Testville",
	postalCode: "00001",
	country: "US",
};

/** Swaps in a subclassed stand-in, e.g. one that fails a chosen call. */
export interface TestContextOverrides {
	reservationRepository?: (db: InMemoryDatabase) => InMemoryStockReservationRepository;
	cartProvider?: (db: InMemoryDatabase) => InMemoryCartProvider;
}

export const buildTestContext = (overrides: TestContextOverrides = {}) => {
	const db = new InMemoryDatabase();
	const transactionManager = new InMemoryTransactionManager(db);
	const stockLockManager = new InMemoryStockLockManager();

	const productStockRepository = new InMemoryProductStockRepository(db);
	const adjustmentRepository = new InMemoryInventoryAdjustmentRepository(db);
	const reservationRepository =
		overrides.reservationRepository?.(db) ?? new InMemoryStockReservationRepository(db);
	const orderRepository = new InMemoryOrderRepository(db);
	const refundRepository = new InMemoryRefundRepository(db);
	const outboxRepository = new InMemoryOutboxRepository(db);
	const cartProvider = overrides.cartProvider?.(db) ?? new InMemoryCartProvider(db);
	const catalogLookup = new InMemoryCatalogLookup(db);

	const outboxEventRecorder = new OutboxEventRecorder(
		outboxRepository,
		new RabbitMQIntegrationEventMapper()
	);
	const stockLedger = new StockLedgerService(
		productStockRepository,
		adjustmentRepository,
		reservationRepository,
		stockLockManager,
		transactionManager,
		outboxEventRecorder
	);
	const reservationService = new ReservationService(reservationRepository, transactionManager);
	const pricingPolicy = new DefaultPricingPolicy();
	const saga = new OrderFulfillmentSaga(
		cartProvider,
		catalogLookup,
		pricingPolicy,
		stockLedger,
		reservationService,
		stockLockManager,
		orderRepository,
		outboxEventRecorder,
		transactionManager
	);

	const cancelOrderUseCase = new CancelOrderUseCase(
		orderRepository,
		adjustmentRepository,
		stockLedger,
		reservationService,
		transactionManager,
		outboxEventRecorder
	);
	const updateOrderStatusUseCase = new UpdateOrderStatusUseCase(
		orderRepository,
		transactionManager,
		outboxEventRecorder,
		cancelOrderUseCase
	);
	const orderService = new OrderService(
		saga,
		new GetOrderByIdUseCase(orderRepository, transactionManager),
		new GetOrderByNumberUseCase(orderRepository, transactionManager),
		new GetOrdersByCustomerIdUseCase(orderRepository, transactionManager),
		new ListOrdersUseCase(orderRepository, transactionManager),
		new CountOrdersByStatusUseCase(orderRepository, transactionManager),
		updateOrderStatusUseCase,
		cancelOrderUseCase,
		new CreateRefundUseCase(
			orderRepository,
			refundRepository,
			new RefundCalculator(),
			transactionManager,
			outboxEventRecorder
		),
		new ProcessRefundUseCase(refundRepository, transactionManager, outboxEventRecorder),
		new GetOrderRefundsUseCase(orderRepository, refundRepository, transactionManager),
		new GetRefundByIdUseCase(refundRepository, transactionManager)
	);

	const seedProduct = (
		productId: string,
		overrides: Partial<Omit<ProductRow, "productId">> = {}
	): void => {
		const storeId = overrides.storeId ?? STORE_ID;
		db.tables.products.set(rowKey(storeId, productId), {
			productId,
			storeId,
			name: `Product ${productId}`,
			sku: `SKU-${productId}`,
			price: 10,
			quantity: 0,
			lowStockThreshold: 0,
			trackInventory: true,
			...overrides,
		});
	};

	const seedCart = (
		cartId: string,
		items: CartRow["items"],
		overrides: Partial<Omit<CartRow, "id" | "items">> = {}
	): void => {
		const storeId = overrides.storeId ?? STORE_ID;
		db.tables.carts.set(rowKey(storeId, cartId), {
			id: cartId,
			storeId,
			customerId: CUSTOMER_ID,
			status: "ACTIVE",
			expiresAt: null,
			...overrides,
			items,
		});
	};

	const quantityOf = (productId: string, storeId = STORE_ID): number | undefined =>
		db.tables.products.get(rowKey(storeId, productId))?.quantity;

	const outboxEventTypes = (): string[] =>
		outboxRepository.all().map((outbox) => outbox.getEventType());

	return {
		db,
		transactionManager,
		stockLockManager,
		productStockRepository,
		adjustmentRepository,
		reservationRepository,
		orderRepository,
		refundRepository,
		outboxRepository,
		cartProvider,
		catalogLookup,
		outboxEventRecorder,
		stockLedger,
		reservationService,
		pricingPolicy,
		saga,
		cancelOrderUseCase,
		updateOrderStatusUseCase,
		orderService,
		seedProduct,
		seedCart,
		quantityOf,
		outboxEventTypes,
	};
};

export type TestContext = ReturnType<typeof buildTestContext>;
