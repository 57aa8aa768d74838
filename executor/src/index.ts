export * from "./commands/registry-allowlist.js";
export * from "./commands/command-validator.js";
export * from "./engine/types.js";
export * from "./engine/error-classifier.js";
export * from "./engine/line-splitter.js";
export * from "./engine/process-execution-engine.js";
export * from "./engine/privileged-execution-engine.js";
export * from "./ports/privilege-escalator.js";
export * from "./adapters/noop-privilege-escalator.js";
export * from "./adapters/polkit-privilege-escalator.js";
