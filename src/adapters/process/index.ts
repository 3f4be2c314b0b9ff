export { createProcessAdapter, resolveEnvironment, type ProcessAdapterConfig } from "./adapter";
