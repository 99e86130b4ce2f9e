import { createRequire } from "node:module";
import pino, { type LoggerOptions, type TransportSingleOptions } from "pino";
import { env, isProduction } from "../config/env.js";

const require = createRequire(import.meta.url);

const buildTransport = () => {
  if (isProduction || env.NODE_ENV === "test") return undefined;
  try {
    require.resolve("pino-pretty");
    return {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "SYS:standard" },
    } satisfies TransportSingleOptions;
  } catch {
    return undefined;
  }
};

const defaultLevel = () => {
  if (isProduction) return "info";
  return env.NODE_ENV === "test" ? "silent" : "debug";
};

const options: LoggerOptions = {
  level: env.LOG_LEVEL ?? defaultLevel(),
  base: {
    env: env.NODE_ENV,
  },
};

const transport = buildTransport();
if (transport) {
  options.transport = transport;
}

export const logger = pino(options);
