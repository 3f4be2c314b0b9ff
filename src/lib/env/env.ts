import * as v from "valibot";
import { type Env, envSchema } from "./schema";

export const parseEnv = (): Env => {
  try {
    return v.parse(envSchema, process.env);
  } catch (error) {
    if (v.isValiError(error)) {
      console.error("Environment variable validation failed:");
      for (const issue of error.issues) {
        console.error(`  - ${issue.path?.map((item) => String(item.key)).join(".")}: ${issue.message}`);
      }
      process.exit(1);
    }
    throw error;
  }
};

// Parsed on first use so tests can set process.env beforehand
let cachedEnv: Env | undefined;

export const getEnv = (): Env => {
  if (!cachedEnv) {
    cachedEnv = parseEnv();
  }
  return cachedEnv;
};

export const resetEnvCache = (): void => {
  cachedEnv = undefined;
};

export type { Env } from "./schema";
