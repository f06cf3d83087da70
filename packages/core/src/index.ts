export * from "./types";
export * from "./errors";
export * from "./urls";
export * from "./metrics";
