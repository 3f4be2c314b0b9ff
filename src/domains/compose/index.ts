export { loadComposeFile, parseCompose } from "./load";
export { normalizeCompose, normalizeHealthcheck } from "./normalize";
export type { ComposeProject } from "./normalize";
export { isDuration, parseDuration } from "./duration";
export { composeFileSchema, composeServiceSchema, healthcheckSchema } from "./schemas";
export type { ComposeFile, ComposeHealthcheck, ComposeService } from "./schemas";
