export interface OutgoingIntegrationEvent<T = unknown> {
	eventId: string;
	eventType: string;
	payload: T;
	correlationId: string | null;
	storeId: string;
	version: string;
	occurredAt: string;
	exchange: string;
	routingKey: string;
	source: string;
}

export interface IntegrationEventRoute {
	exchange: string;
	routingKey: string;
}

export const INTEGRATION_EVENT_SOURCE = "order-fulfillment-service";
export const INTEGRATION_EVENT_VERSION = "1.0";
