export type Logger = (message: string) => void;

// stdout is reserved for command output.
export function createLogger(scope: string, detail?: string): Logger {
  return (message: string) => console.error(`[${scope}${detail ? `:${detail}` : ''}] ${message}`);
}
