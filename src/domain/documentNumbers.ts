import moment from "moment";
import { v7 as uuid } from "uuid";

// UUIDv7 leads with the timestamp; the tail carries the random bits.
const uniqueSuffix = (): string => uuid().replace(/-/g, "").slice(-8).toUpperCase();

export const generateOrderNumber = (date: Date = new Date()): string =>
	`ORD-${moment.utc(date).format("YYYYMMDD")}-${uniqueSuffix()}`;

export const generateRefundNumber = (date: Date = new Date()): string =>
	`REF-${moment.utc(date).format("YYYYMMDD")}-${uniqueSuffix()}`;
