import * as winston from "winston";

export type Logger = winston.Logger;

function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return {
      ...value,
      name: value.name,
      message: value.message,
      stack: value.stack,
      cause: value.cause,
    };
  }
  return value;
}

function metadataOf(info: winston.Logform.TransformableInfo): Record<string, unknown> {
  const metadata = info.metadata;
  return typeof metadata === "object" && metadata !== null ? Object.fromEntries(Object.entries(metadata)) : {};
}

const logFormat = winston.format.printf((info) => {
  const metadata = metadataOf(info);
  const scope = `[${String(metadata.module ?? "")}:${String(metadata.method ?? "")}]`;
  const extra =
    info.level.includes("error") || info.level.includes("warn")
      ? ` ${JSON.stringify(metadata, errorReplacer)}`
      : "";
  return `${String(info.timestamp)} ${info.level} ${scope}: ${String(info.message)}${extra}`;
});

export const logger = winston.createLogger({
  level: process.env.LOGGING_LEVEL?.toLowerCase() ?? "warn",
  format: winston.format.json({ replacer: errorReplacer }),
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
        winston.format.metadata({
          fillExcept: ["message", "level", "timestamp"],
        }),
        winston.format.colorize(),
        logFormat,
      ),
    }),
  ],
});
