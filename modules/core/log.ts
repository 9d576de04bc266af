export type LogFn = (message: string) => void;

export const formatLogTime = (date: Date) =>
  date.toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

export function log(message: string, source = "abc-flow") {
  console.log(`${formatLogTime(new Date())} [${source}] ${message}`);
}

export const createLogger = (source: string): LogFn => (message) => log(message, source);
