// Core data model
export * from "./common";
export * from "./test-result";
export * from "./api-resources";
export * from "./validation";
export * from "./serialization";
