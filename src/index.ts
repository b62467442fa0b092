export * from "./core/git";
export * from "./core/log";
export * from "./core/defaults";
export * from "./core/suggest";
export * from "./core/guards";
export * from "./core/rollup-check";
export * from "./core/publish";
export * from "./core/outputs";
export * from "./types/errors";
