export * from "./config/Config.js";
export * from "./config/ConfigErrors.js";
export * from "./config/ConfigLoader.js";
export * from "./auth/TokenAcquirer.js";
export * from "./auth/EntraTokenAcquirer.js";
export * from "./http/ApiInvoker.js";
export * from "./http/FetchApiInvoker.js";
export * from "./http/RequestBodyPolicy.js";
export * from "./runtime/Deadline.js";
export * from "./runtime/TestOutcome.js";
export * from "./runtime/RunSummary.js";
export * from "./runtime/EndpointTester.js";
export * from "./runtime/RunOrchestrator.js";
export * from "./reporting/ConsoleReporter.js";
