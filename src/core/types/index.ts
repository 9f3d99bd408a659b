/**
 * Core types and interfaces
 */

export * from "./config";
export * from "./errors";
export * from "./schedule";
