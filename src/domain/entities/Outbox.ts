import Entity from "./Entity";

export const MAX_OUTBOX_RETRIES = 5;

export interface OutboxMessage {
	eventType: string;
	payload: unknown;
	correlationId: string | null;
	storeId: string;
	version: string;
	occurredAt: Date;
	exchange: string;
	routingKey: string;
	source: string;
}

export interface OutboxProps extends OutboxMessage {
	eventId: string;
	retryCount: number;
	error: string | null;
	createdAt: Date;
	processedAt: Date | null;
}

export class Outbox extends Entity {
	static loadOutboxEvent(props: OutboxProps): Outbox {
		const outbox = new Outbox(props, props.eventId);
		outbox.retryCount = props.retryCount;
		outbox.error = props.error;
		outbox.createdAt = props.createdAt;
		outbox.processedAt = props.processedAt;
		outbox.setWasUpdated(false);
		return outbox;
	}

	private readonly message: Readonly<OutboxMessage>;
	private retryCount: number;
	private error: string | null;
	private createdAt: Date;
	private processedAt: Date | null;
	private wasUpdated: boolean;

	constructor(message: OutboxMessage, eventId?: string) {
		super(eventId);
		this.message = message;
		this.retryCount = 0;
		this.error = null;
		this.createdAt = new Date();
		this.processedAt = null;
		this.wasUpdated = true;
	}

	public getEventId(): string {
		return this.getId();
	}

	public getEventType(): string {
		return this.message.eventType;
	}

	public getPayload(): unknown {
		return this.message.payload;
	}

	public getCorrelationId(): string | null {
		return this.message.correlationId;
	}

	public getStoreId(): string {
		return this.message.storeId;
	}

	public getVersion(): string {
		return this.message.version;
	}

	public getOccurredAt(): Date {
		return this.message.occurredAt;
	}

	public getExchange(): string {
		return this.message.exchange;
	}

	public getRoutingKey(): string {
		return this.message.routingKey;
	}

	public getSource(): string {
		return this.message.source;
	}

	public getRetryCount(): number {
		return this.retryCount;
	}

	public getError(): string | null {
		return this.error;
	}

	public getCreatedAt(): Date {
		return this.createdAt;
	}

	public getProcessedAt(): Date | null {
		return this.processedAt;
	}

	public getWasUpdated(): boolean {
		return this.wasUpdated;
	}

	public setWasUpdated(wasUpdated: boolean): void {
		this.wasUpdated = wasUpdated;
	}

	public isPending(): boolean {
		return this.processedAt === null && this.retryCount < MAX_OUTBOX_RETRIES;
	}

	public markAsProcessed(now: Date = new Date()): void {
		this.processedAt = now;
		this.wasUpdated = true;
	}

	public incrementRetry(errorMessage?: string): void {
		this.retryCount++;
		if (errorMessage) {
			this.error = errorMessage;
		}
		this.wasUpdated = true;
	}
}
