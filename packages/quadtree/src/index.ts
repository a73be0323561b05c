export * from "./QuadTree";
export * from "./QuadTreeNode";
export * from "./QuadTreeCollector";
export * from "./config";
export * from "./create";
export * from "./errors";
export * from "./types";
