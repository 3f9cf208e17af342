let debugEnabled = process.env.SINNERDLE_DEBUG === "1";

export function setDebug(enabled: boolean) {
  debugEnabled = enabled;
}

export function isDebugEnabled(): boolean {
  return debugEnabled;
}

export function debugLog(...args: unknown[]) {
  if (isDebugEnabled()) console.debug(...args);
}

export function infoLog(...args: unknown[]) {
  if (isDebugEnabled()) console.info(...args);
}

export function warnLog(message: string) {
  console.warn(`[WARNING] ${message}`);
}
