export * from "./identity";
export * from "./humanView";
export * from "./shadowView";
export * from "./overlay";
export * from "./taskQueue";
