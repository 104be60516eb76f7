export * from "./models.js";
export * from "./contracts.js";
