import pino from "pino";
import { IConfig } from "../../shared/config/IConfig";

export function createPinoInstance(
  config: Pick<IConfig, "logLevel" | "nodeEnv">,
  name = "logos-api",
): pino.Logger {
  return pino({
    name,
    level: config.logLevel,
    transport:
      config.nodeEnv !== "production"
        ? {
            target: "pino-pretty",
            options: {
              colorize: true,
              ignore: "pid,hostname",
              translateTime: "SYS:standard",
            },
          }
        : undefined,
  });
}
