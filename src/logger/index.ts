import pino, { Logger } from "pino";
import dotenv from "dotenv";
import type { TaskName } from "../interfaces/pipelineResult";

dotenv.config({
    quiet: process.env.NODE_ENV === 'test',
});

const env = process.env.NODE_ENV;

function resolveLevel(): string {
    if (env === "test") return "silent";

    const requested = process.env.LOG_LEVEL?.toLowerCase();
    if (requested && requested in pino.levels.values) return requested;

    return env === "development" ? "debug" : "info";
}

export const logger = pino({
    level: resolveLevel(),
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { pid: process.pid, service: "weather-etl" },
    transport: env === "development"
        ? {
            target: "pino-pretty",
            options: {
                colorize: true,
                translateTime: "yyyy-mm-dd HH:MM:ss",
                ignore: "pid,hostname,service",
                messageFormat: "{if stage}[{stage}] {end}{msg}",
            },
        }
        : undefined,
});

// Every line a stage writes carries its name
export function stageLogger(stage: TaskName): Logger {
    return logger.child({ stage });
}
