function timestamp(): string {
  return new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });
}

export function log(message: string, source = "express") {
  console.log(`${timestamp()} [${source}] ${message}`);
}

export function logWarn(message: string, source: string) {
  console.warn(`${timestamp()} [${source}] ${message}`);
}

export function logError(message: string, source: string, err?: unknown) {
  if (err === undefined) {
    console.error(`${timestamp()} [${source}] ${message}`);
    return;
  }
  const detail = err instanceof Error ? err.message : String(err);
  console.error(`${timestamp()} [${source}] ${message}: ${detail}`);
}
