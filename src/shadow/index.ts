export * from "./language";
export * from "./projector";
