import { v7 as uuid } from "uuid";
import type { IntegrationEventMapper } from "@/application/ports/IntegrationEventMapper";
import type { FulfillmentDomainEvent } from "@/domain/events/DomainEvents";
import {
	INTEGRATION_EVENT_SOURCE,
	INTEGRATION_EVENT_VERSION,
	type IntegrationEventRoute,
	type OutgoingIntegrationEvent,
} from "./IntegrationEvents";

const ROUTES: Record<FulfillmentDomainEvent["type"], IntegrationEventRoute> = {
	ORDER_CREATED: {
		exchange: "order_events",
		routingKey: "order.created",
	},
	ORDER_STATUS_CHANGED: {
		exchange: "order_events",
		routingKey: "order.status.changed",
	},
	ORDER_SHIPPED: {
		exchange: "order_events",
		routingKey: "order.shipped",
	},
	ORDER_DELIVERED: {
		exchange: "order_events",
		routingKey: "order.delivered",
	},
	ORDER_CANCELLED: {
		exchange: "order_events",
		routingKey: "order.cancelled",
	},
	REFUND_REQUESTED: {
		exchange: "refund_events",
		routingKey: "refund.requested",
	},
	REFUND_PROCESSED: {
		exchange: "refund_events",
		routingKey: "refund.processed",
	},
	INVENTORY_LOW_STOCK: {
		exchange: "inventory_events",
		routingKey: "inventory.low_stock",
	},
};

export class RabbitMQIntegrationEventMapper implements IntegrationEventMapper {
	map(event: FulfillmentDomainEvent): OutgoingIntegrationEvent | null {
		const route = this.getRoute(event);
		if (!route) return null;

		return {
			eventId: uuid(),
			eventType: event.type,
			payload: event.data,
			correlationId: event.aggregateId,
			storeId: event.storeId,
			version: INTEGRATION_EVENT_VERSION,
			occurredAt: event.timestamp.toISOString(),
			exchange: route.exchange,
			routingKey: route.routingKey,
			source: INTEGRATION_EVENT_SOURCE,
		};
	}

	private getRoute(event: FulfillmentDomainEvent): IntegrationEventRoute | null {
		return ROUTES[event.type] ?? null;
	}
}
