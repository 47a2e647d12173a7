import { pino, type Logger } from "pino";

const pretty = process.env.NODE_ENV !== "test";

export const logger = pino({
  ...(pretty && {
    transport: {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "HH:MM:ss", destination: 2 },
    },
  }),
  level: process.env.LOG_LEVEL || "info",
});

// Children keep the level they were created with; setLogLevel updates them too.
const children: Logger[] = [];

export function createLogger(name: string): Logger {
  const child = logger.child({ name });
  children.push(child);
  return child;
}

export function setLogLevel(level: string) {
  logger.level = level;
  for (const child of children) child.level = level;
}
