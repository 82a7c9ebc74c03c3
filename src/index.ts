// Library entry point for the Feature.fm API test harness
export * from "./types";
export * from "./config";
export * from "./client";
export * from "./recorder";
export * from "./testers";
export * from "./cli";

export const VERSION = "2.0.0";
export const APP_NAME = "featurefm-api-tester";
