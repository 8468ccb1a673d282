export * from "./types";
export * from "./rewrite";
export * from "./edits";
export * from "./interceptors";
export * from "./inflight";
export * from "./diagnostics";
export * from "./registry";
export * from "./session";
export * from "./proxy";
