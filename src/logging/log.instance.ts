import winston from "winston";
import config from "config";
import { createNamespace, getNamespace } from "cls-hooked";

/** Name of the cls namespace that carries the id of the notification batch being dispatched */
export const LOG_NAMESPACE = "logger";
export const NOTIFICATION_ID_KEY = "id";

export const logContext = getNamespace(LOG_NAMESPACE) ?? createNamespace(LOG_NAMESPACE);

type LogLine = {
    timestamp?: unknown;
    level: string;
    message: unknown;
}

const defaultFormat = {
    format : winston.format.combine(
        winston.format.timestamp({
            format: 'DD-MM-YYYY HH:mm:ss'
        }),
        winston.format.splat(),
        winston.format.printf(info => templateFunction(info))
    )
}

function templateFunction(info: LogLine): string {
    const id: unknown = logContext.get(NOTIFICATION_ID_KEY);
    return `[${info.timestamp}] ${info.level} ${typeof id === "string" ? "(" + id + ")" : ''}: ${info.message}`;
}

/**
 * Creates defaultFormat custom logger instance.
 * @link https://github.com/winstonjs/winston
 */
const log = winston.createLogger({
    level: config.get<string>("logging.level"),
    format: defaultFormat.format,
    transports: []
});

const silent = config.get<boolean>("logging.silent");

if (process.env.NODE_ENV === "prod" || process.env.NODE_ENV === "test") {
    log.add(new winston.transports.Console({ silent }));
} else {
    log.add(new winston.transports.Console(
        { silent,
            format: winston.format.combine(
                winston.format.colorize(),
                defaultFormat.format
            ) },
    ));
}

export default log;
