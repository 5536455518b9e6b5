import pino from "pino";
import dotenv from "dotenv";

dotenv.config({
    quiet: process.env.NODE_ENV === 'test',
});

const env = process.env.NODE_ENV;

function resolveLevel(): string {
    if (env === "test") return "silent";
    if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
    return env === "development" ? "debug" : "info";
}

export const logger = pino({
    level: resolveLevel(),
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { pid: process.pid, service: "weather-service" },
    transport: env === "development"
        ? {
            target: "pino-pretty",
            options: {
                colorize: true,
                translateTime: "yyyy-mm-dd HH:MM:ss",
                ignore: "pid,hostname",
            },
        }
        : undefined,
});

export type Logger = pino.Logger;

export function componentLogger(component: string): Logger {
    return logger.child({ component });
}
