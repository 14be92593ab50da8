export * from "./errors";
export * from "./functionApp";
export * from "./plan";
export * from "./runtime";
export * from "./skus";
export type * from "./types";
