export { getEnv, parseEnv, resetEnvCache, type Env } from "./env";
