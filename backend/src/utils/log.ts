function clock(d = new Date()) {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

function quiet() {
  return process.env.NODE_ENV === "test";
}

function line(scope: string, message: string, requestId?: string) {
  const rid = requestId ? ` (${requestId})` : "";
  return `[${clock()}] [${scope}]${rid} ${message}`;
}

export type Logger = {
  info(message: string): void;
  error(message: string, err?: unknown): void;
};

/**
 * Scoped console logger. `requestId` ties lines of one upload together.
 */
export function logger(scope: string, requestId?: string): Logger {
  return {
    info(message) {
      if (quiet()) return;
      console.log(line(scope, message, requestId));
    },
    error(message, err) {
      const detail = err instanceof Error ? err.message : err === undefined ? "" : String(err);
      console.error(line(scope, detail ? `${message}: ${detail}` : message, requestId));
    },
  };
}
