import { object, optional, parse, picklist, pipe, regex, string, transform, type InferOutput } from "valibot";
import { ZERO_ADDRESS } from "./utils/bytes";
import type { Address } from "./core/types";

const envSchema = object({
  PROTOCOL_VERSION: optional(pipe(string(), regex(/^\S+$/)), "1"),
  LOG_LEVEL: optional(
    picklist(["fatal", "error", "warn", "info", "debug", "trace", "silent"]),
    "info",
  ),
  LOG_PRETTY: optional(
    pipe(
      picklist(["true", "false"]),
      transform((s) => s === "true"),
    ),
    "false",
  ),
  FACTORY_ADDRESS: optional(pipe(string(), regex(/^0x[0-9a-fA-F]{40}$/)), ZERO_ADDRESS),
});

export type EnvConfig = InferOutput<typeof envSchema>;

export type Config = {
  protocolVersion: string;
  logLevel: EnvConfig["LOG_LEVEL"];
  logPretty: boolean;
  factoryAddress: Address;
};

/* throws ValiError on a malformed variable */
export const loadConfig = (env: Record<string, string | undefined> = process.env): Config => {
  const parsed = parse(envSchema, env);
  return {
    protocolVersion: parsed.PROTOCOL_VERSION,
    logLevel: parsed.LOG_LEVEL,
    logPretty: parsed.LOG_PRETTY,
    factoryAddress: `0x${parsed.FACTORY_ADDRESS.slice(2).toLowerCase()}`,
  };
};
