export * from "./result-display";
export * from "./prompter";
export * from "./confirmation";
export * from "./cli-runner";
