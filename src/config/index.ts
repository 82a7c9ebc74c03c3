export * from "./api-config";
export * from "./errors";
