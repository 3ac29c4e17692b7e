// Transaction model, receipts, and dispatch errors.

export * from "./types.ts";
export * from "./schemas.ts";
export * from "./codec.ts";
export * from "./receipts.ts";
export * from "./errors.ts";
