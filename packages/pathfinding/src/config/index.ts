export * from "./solver-config.js";
