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

export function logWarning(message: string, source = "express") {
  console.warn(`${timestamp()} [${source}] ${message}`);
}

export function logError(message: string, source = "express", err?: unknown) {
  if (err === undefined) {
    console.error(`${timestamp()} [${source}] ${message}`);
  } else {
    console.error(`${timestamp()} [${source}] ${message}`, err);
  }
}
