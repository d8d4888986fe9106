// CI/CD Failure Assistant - Main entry point
// This file exports the public API for programmatic usage

export * from "./types/index.js";
export * from "./infra/index.js";
export * from "./core/index.js";
