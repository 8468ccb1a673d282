export * from "./core/keys";
export * from "./core/origins";
export * from "./core/types";
export * from "./core/config";
export * from "./access/cells";
export * from "./access/layout";
export * from "./ops/mutations";
export * from "./quality/reconcile";
export * from "./quality/validation";
export * from "./document";
