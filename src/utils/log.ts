/**
 * Print debug information to stderr
 */
export function printDebug(label: string, data: unknown): void {
  console.error(`[DEBUG] ${label}:`, JSON.stringify(data, null, 2));
}
