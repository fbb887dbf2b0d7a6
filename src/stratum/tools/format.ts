/**
 * Tool result serialization
 */

export const TRUNCATION_MARKER = "\n[TRUNCATED]";

/**
 * Truncate output to max bytes
 */
export function truncateOutput(output: string, maxBytes: number): string {
  if (Buffer.byteLength(output) <= maxBytes) {
    return output;
  }

  const budget = Math.max(0, maxBytes - Buffer.byteLength(TRUNCATION_MARKER));

  // Binary search for the longest prefix that fits
  let low = 0;
  let high = output.length;

  while (low < high) {
    const mid = Math.floor((low + high + 1) / 2);
    if (Buffer.byteLength(output.slice(0, mid)) <= budget) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }

  return output.slice(0, low) + TRUNCATION_MARKER;
}

/**
 * Strings pass through; everything else is compact JSON
 */
export function formatToolResult(value: unknown, maxBytes: number): string {
  let text: string;
  if (typeof value === "string") {
    text = value;
  } else {
    try {
      text = JSON.stringify(value) ?? "null";
    } catch (error) {
      text = `[unserializable result: ${error instanceof Error ? error.message : String(error)}]`;
    }
  }
  return truncateOutput(text, maxBytes);
}
