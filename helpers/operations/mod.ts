export * from "./core.ts";
export * from "./combination.ts";
export * from "./sharing.ts";
