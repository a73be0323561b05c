export * from "./box";
export * from "./clip";
export * from "./segment";
export * from "./transform";
