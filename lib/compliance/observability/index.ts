export * from "./types";
export * from "./console-observer";
