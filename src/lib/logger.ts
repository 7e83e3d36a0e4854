import pino from "pino";
import { config } from "./config";

// stdout carries the startup protocol, so logs always go to stderr.
const STDERR = 2;

const usePretty = config.isDev && config.env !== "test";

export const logger = usePretty
  ? pino({
      level: config.logLevel,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
          destination: STDERR,
        },
      },
    })
  : pino({ level: config.logLevel }, pino.destination(STDERR));

export default logger;
