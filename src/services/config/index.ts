export { ConfigService, createConfigService } from "./config-service";
export type { ConfigServiceDeps } from "./config-service";
export { ConfigFileSchema, DEFAULT_CONFIG } from "./types";
export type { ConfigFile, FontListerConfig, OutputFormat } from "./types";
