/**
 * Gates noisy traces behind the DEBUG/CHAT_DEBUG namespaces.
 * Usage: debugLog("chat.gateway", "frame", payload);
 */
const RAW_DEBUG =
  (typeof process !== "undefined" && process?.env?.DEBUG) ||
  (typeof process !== "undefined" && process?.env?.CHAT_DEBUG) ||
  "";

const DEBUG_NAMESPACES = new Set(
  RAW_DEBUG.split(/[,\s]+/)
    .map((entry) => entry.trim())
    .filter(Boolean),
);

export function isDebugEnabled(namespace: string): boolean {
  if (!namespace) return false;
  if (DEBUG_NAMESPACES.has("*")) return true;
  if (DEBUG_NAMESPACES.has(namespace)) return true;
  const root = namespace.split(".")[0];
  return Boolean(root && DEBUG_NAMESPACES.has(`${root}.*`));
}

export function debugLog(namespace: string, ...args: unknown[]): void {
  if (!isDebugEnabled(namespace)) return;
  console.debug(`[${namespace}]`, ...args);
}
