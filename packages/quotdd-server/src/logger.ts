import pino, { type Logger } from "pino";

const STDERR = 2;

export function createLogger(level: string): Logger {
  if (process.env.NODE_ENV === "production") {
    return pino({ level }, pino.destination(STDERR));
  }
  return pino({
    level,
    transport: { target: "pino-pretty", options: { destination: STDERR } },
  });
}
