export * from "./base-tester";
export * from "./payloads";
export * from "./sandbox-tester";
export * from "./production-tester";
export * from "./complete-tester";
