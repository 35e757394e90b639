import pino from "pino";

const isDevelopment = process.env.NODE_ENV === "development";
const isTest = process.env.NODE_ENV === "test";
const logLevel = process.env.LOG_LEVEL || (isTest ? "silent" : "info");

//logs always go to stderr so the CLI can print JSON results on stdout
export const logger = isDevelopment
    ? pino({
        level: logLevel,
        transport: {
            target: "pino-pretty",
            options: {
                colorize: true,
                translateTime: "SYS:standard",
                ignore: "pid,hostname",
                destination: 2
            }
        }
    })
    : pino({ level: logLevel }, pino.destination(2));

export type Logger = typeof logger;
