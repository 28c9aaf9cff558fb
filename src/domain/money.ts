/**
 * Amounts travel as decimal numbers (2 fraction digits) but every sum, product and
 * percentage is computed on integer cents.
 */
export const toCents = (amount: number): number => Math.round(amount * 100);

export const fromCents = (cents: number): number => cents / 100;

export const sumMoney = (amounts: number[]): number =>
	fromCents(amounts.reduce((total, amount) => total + toCents(amount), 0));

export const multiplyMoney = (amount: number, quantity: number): number =>
	fromCents(toCents(amount) * quantity);

export const percentOf = (amount: number, rate: number): number =>
	fromCents(Math.round(toCents(amount) * rate));
