import pino, { type Logger, type TransportSingleOptions } from "pino";
import type { LoggingConfig } from "../config/types";

let loggerInstance: Logger | null = null;

export function configureLogger(config: LoggingConfig): Logger {
    let transport: TransportSingleOptions | undefined;

    if (config.pretty) {
        try {
            transport = {
                target: require.resolve("pino-pretty"),
                options: {
                    colorize: true,
                    translateTime: "SYS:standard",
                },
            };
        } catch {
            console.warn('[ragcore] "pino-pretty" could not be resolved. Falling back to JSON logs.');
        }
    }

    loggerInstance = pino({
        level: config.level,
        base: undefined,
        transport,
    });
    return loggerInstance;
}

export function getLogger(): Logger {
    if (!loggerInstance) {
        loggerInstance = pino({
            level: "info",
            base: undefined,
        });
    }
    return loggerInstance;
}

export function childLogger(logger: Logger, bindings: Record<string, string>): Logger {
    return typeof logger.child === "function" ? logger.child(bindings) : logger;
}
