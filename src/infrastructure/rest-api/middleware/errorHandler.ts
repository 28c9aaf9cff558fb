import type { NextFunction, Request, Response } from "express";
import {
	type DomainErrorCode,
	isDomainError,
	ValidationError,
} from "@/domain/errors/DomainError";

const STATUS_BY_CODE: Record<DomainErrorCode, number> = {
	NOT_FOUND: 404,
	INVALID_STATE: 422,
	UNAUTHORIZED: 403,
	INSUFFICIENT_STOCK: 409,
	RESERVATION_CONFLICT: 409,
	INVALID_TRANSITION: 409,
	VALIDATION_FAILED: 400,
	CONCURRENT_MODIFICATION: 409,
	STOCK_LOCK_TIMEOUT: 503,
	INTERNAL_ERROR: 500,
};

export interface HttpError {
	status: number;
	body: {
		code: DomainErrorCode;
		message: string;
		retryable: boolean;
		details?: string[];
	};
}

const isJsonSyntaxError = (error: unknown): boolean =>
	error instanceof SyntaxError && "body" in error;

export const toHttpError = (error: unknown): HttpError => {
	if (isDomainError(error)) {
		return {
			status: STATUS_BY_CODE[error.code],
			body: {
				code: error.code,
				message: error.message,
				retryable: error.retryable,
				...(error instanceof ValidationError && error.details.length > 0
					? { details: error.details }
					: {}),
			},
		};
	}

	if (isJsonSyntaxError(error)) {
		return {
			status: 400,
			body: { code: "VALIDATION_FAILED", message: "Malformed JSON body", retryable: false },
		};
	}

	return {
		status: 500,
		body: { code: "INTERNAL_ERROR", message: "Something went wrong!", retryable: false },
	};
};

export const errorHandler = (
	error: unknown,
	req: Request,
	res: Response,
	_next: NextFunction
): void => {
	const httpError = toHttpError(error);

	if (httpError.status >= 500) {
		console.error(`[HTTP] ${req.method} ${req.originalUrl} failed:`, error);
	}

	res.status(httpError.status).json(httpError.body);
};
