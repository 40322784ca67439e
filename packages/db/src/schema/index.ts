export * from "./contract-agreements.js";
export * from "./contract-negotiations.js";
