export * from "./emitter";
export * from "./undo";
export * from "./synchronizer";
