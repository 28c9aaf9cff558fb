/** Resolves after `ms` milliseconds; used by retry and polling loops. */
export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));
