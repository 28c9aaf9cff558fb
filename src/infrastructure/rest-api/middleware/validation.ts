import { type ClassConstructor, plainToInstance } from "class-transformer";
import { type ValidationError as ClassValidationError, validate } from "class-validator";
import { ValidationError } from "@/domain/errors/DomainError";

const flattenErrors = (errors: ClassValidationError[], parentPath = ""): string[] =>
	errors.flatMap((error) => {
		const path = parentPath ? `${parentPath}.${error.property}` : error.property;
		const own = Object.values(error.constraints ?? {}).map((message) =>
			message.startsWith(error.property)
				? `${path}${message.slice(error.property.length)}`
				: `${path}: ${message}`
		);
		return [...own, ...flattenErrors(error.children ?? [], path)];
	});

/** Turns a JSON body into a validated DTO instance or throws ValidationError. */
export const validateBody = async <T extends object>(
	dto: ClassConstructor<T>,
	body: unknown
): Promise<T> => {
	if (typeof body !== "object" || body === null || Array.isArray(body)) {
		throw new ValidationError("Request body must be a JSON object");
	}

	const instance = plainToInstance(dto, body);
	const errors = await validate(instance, { forbidUnknownValues: true });
	if (errors.length > 0) {
		const details = flattenErrors(errors);
		throw new ValidationError(`Request validation failed: ${details.join("; ")}`, details);
	}

	return instance;
};

/** Same checks for a parsed query string, whose values all arrive as strings. */
export const validateQuery = <T extends object>(
	dto: ClassConstructor<T>,
	query: unknown
): Promise<T> => validateBody(dto, query);
