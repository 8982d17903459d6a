/**
 * Format bytes to human-readable format
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return "0 B";
  const k = 1024;
  const sizes = ["B", "KB", "MB", "GB", "TB"];
  const i = Math.min(
    Math.floor(Math.log(bytes) / Math.log(k)),
    sizes.length - 1,
  );
  return `${(bytes / Math.pow(k, i)).toFixed(2)} ${sizes[i]}`;
}

/**
 * Show the first characters of a credential and mask the rest
 */
export function maskSecret(value: string, visible: number = 4): string {
  if (value.length <= visible) {
    return "*".repeat(value.length);
  }
  return `${value.slice(0, visible)}${"*".repeat(value.length - visible)}`;
}
