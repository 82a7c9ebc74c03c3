export * from "./result-recorder";
