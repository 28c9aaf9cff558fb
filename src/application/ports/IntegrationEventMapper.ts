import type { FulfillmentDomainEvent } from "@/domain/events/DomainEvents";
import type { OutgoingIntegrationEvent } from "@/infrastructure/events/IntegrationEvents";

export interface IntegrationEventMapper {
	map(event: FulfillmentDomainEvent): OutgoingIntegrationEvent | null;
}
