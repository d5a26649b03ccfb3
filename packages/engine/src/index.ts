export * from "./types.js";
export { loadConfig } from "./config.js";
export type { AppConfig } from "./config.js";
export { ConfigError, RemoteServiceError } from "./errors.js";
export * from "./matching/index.js";
export * from "./news/index.js";
export * from "./markets/index.js";
export * from "./llm/index.js";
export * from "./summarizer/index.js";
export { createServices } from "./services.js";
export type { Services } from "./services.js";
export { createRequestHandler, API_VERSION } from "./server/routes.js";
export type { ApiDependencies } from "./server/routes.js";
export * from "./server/responses.js";
