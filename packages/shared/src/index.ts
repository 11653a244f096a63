export * from "./config.js";
export * from "./reasonCodes.js";
