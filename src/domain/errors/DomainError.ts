export type DomainErrorCode =
	| "NOT_FOUND"
	| "INVALID_STATE"
	| "UNAUTHORIZED"
	| "INSUFFICIENT_STOCK"
	| "RESERVATION_CONFLICT"
	| "INVALID_TRANSITION"
	| "VALIDATION_FAILED"
	| "CONCURRENT_MODIFICATION"
	| "STOCK_LOCK_TIMEOUT"
	| "INTERNAL_ERROR";

export class DomainError extends Error {
	constructor(
		message: string,
		public readonly code: DomainErrorCode,
		public readonly retryable: boolean
	) {
		super(message);
		this.name = "DomainError";
	}
}

export class NotFoundError extends DomainError {
	constructor(resource: string, id: string) {
		super(`${resource} not found: ${id}`, "NOT_FOUND", false);
		this.name = "NotFoundError";
	}
}

export class InvalidStateError extends DomainError {
	constructor(message: string) {
		super(message, "INVALID_STATE", false);
		this.name = "InvalidStateError";
	}
}

export class UnauthorizedError extends DomainError {
	constructor(message: string) {
		super(message, "UNAUTHORIZED", false);
		this.name = "UnauthorizedError";
	}
}

export class InsufficientStockError extends DomainError {
	constructor(
		public readonly productId: string,
		public readonly requested: number,
		public readonly available: number
	) {
		super(
			`Insufficient stock for product ${productId}: requested ${requested}, available ${available}`,
			"INSUFFICIENT_STOCK",
			false
		);
		this.name = "InsufficientStockError";
	}
}

export class ReservationConflictError extends DomainError {
	constructor(message: string) {
		super(message, "RESERVATION_CONFLICT", false);
		this.name = "ReservationConflictError";
	}
}

export class InvalidTransitionError extends DomainError {
	constructor(
		public readonly from: string,
		public readonly to: string
	) {
		super(`Cannot transition order from ${from} to ${to}`, "INVALID_TRANSITION", false);
		this.name = "InvalidTransitionError";
	}
}

export class ValidationError extends DomainError {
	constructor(
		message: string,
		public readonly details: string[] = []
	) {
		super(message, "VALIDATION_FAILED", false);
		this.name = "ValidationError";
	}
}

export class ConcurrentModificationError extends DomainError {
	constructor(resource: string, id: string) {
		super(`${resource} ${id} was modified concurrently`, "CONCURRENT_MODIFICATION", true);
		this.name = "ConcurrentModificationError";
	}
}

export class StockLockTimeoutError extends DomainError {
	constructor(productId: string, waitMs: number) {
		super(
			`Timed out after ${waitMs}ms waiting for stock lock on product ${productId}`,
			"STOCK_LOCK_TIMEOUT",
			true
		);
		this.name = "StockLockTimeoutError";
	}
}

export class InternalError extends DomainError {
	constructor(message: string, cause?: unknown) {
		super(message, "INTERNAL_ERROR", false);
		this.name = "InternalError";
		this.cause = cause;
	}
}

export const isDomainError = (error: unknown): error is DomainError =>
	error instanceof DomainError;

export const errorMessage = (error: unknown): string =>
	error instanceof Error ? error.message : "Unknown error";
