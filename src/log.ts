// src/log.ts

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** Writes everything to stderr so stdout stays free for output (and for MCP stdio). */
export const consoleLogger: Logger = {
  info: (message) => console.error(message),
  warn: (message) => console.error(`Warning: ${message}`),
  error: (message) => console.error(`Error: ${message}`),
};

/** Logger that keeps every message in memory, grouped by level. */
export function createRecordingLogger(): Logger & { messages: { level: keyof Logger; message: string }[] } {
  const messages: { level: keyof Logger; message: string }[] = [];
  return {
    messages,
    info: (message) => { messages.push({ level: 'info', message }); },
    warn: (message) => { messages.push({ level: 'warn', message }); },
    error: (message) => { messages.push({ level: 'error', message }); },
  };
}
