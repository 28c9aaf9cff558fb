import { v7 as uuid } from "uuid";
import type { DomainEvent } from "../events/DomainEvents";

abstract class Entity<TEvent extends DomainEvent = DomainEvent> {
	private id: string;
	private domainEvents: TEvent[] = [];

	protected constructor(id?: string) {
		this.id = id ?? uuid();
	}

	public getId(): string {
		return this.id;
	}

	protected setId(id: string): void {
		this.id = id;
	}

	protected addDomainEvent(event: TEvent): void {
		this.domainEvents.push(event);
	}

	public getDomainEvents(): TEvent[] {
		return [...this.domainEvents];
	}

	/** Returns the recorded events and empties the buffer. */
	public pullDomainEvents(): TEvent[] {
		const events = this.domainEvents;
		this.domainEvents = [];
		return events;
	}

	public clearDomainEvents(): void {
		this.domainEvents = [];
	}

	public hasPendingEvents(): boolean {
		return this.domainEvents.length > 0;
	}
}

export default Entity;
