export * from "./notebook";
export * from "./anchors/tracker";
export * from "./shadow";
export * from "./views";
export * from "./sync";
export * from "./protocol";
export * from "./jotai";
