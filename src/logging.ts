import pino from "pino";

export type ILogger = Pick<pino.Logger, "debug" | "info" | "warn" | "error">;

export const makeLogger = (
  level: pino.LevelWithSilent = "info",
  pretty = false,
): pino.Logger =>
  pretty
    ? pino({
        level,
        transport: {
          target: "pino-pretty",
          options: { colorize: true, translateTime: "HH:MM:ss.l" },
        },
      })
    : pino({ level });

export const silentLogger = (): ILogger => pino({ level: "silent" });
