import type { TruncateDirection } from "./types";

export interface TruncationResult {
  output: string;
  truncated: boolean;
  originalLength: number;
}

/** Keep the first `maxChars` characters (file-like output: the beginning matters most). */
export function truncateHead(output: string, maxChars: number): TruncationResult {
  const originalLength = output.length;
  if (maxChars <= 0 || originalLength <= maxChars) {
    return { output, truncated: false, originalLength };
  }
  const kept = sliceHead(output, maxChars);
  return {
    output: `${kept}\n\n... (truncated from ${originalLength} characters)`,
    truncated: true,
    originalLength,
  };
}

/** Keep the last `maxChars` characters (log-like output: recent lines matter most). */
export function truncateTail(output: string, maxChars: number): TruncationResult {
  const originalLength = output.length;
  if (maxChars <= 0 || originalLength <= maxChars) {
    return { output, truncated: false, originalLength };
  }
  const kept = sliceTail(output, maxChars);
  return {
    output: `... (truncated from ${originalLength} characters)\n\n${kept}`,
    truncated: true,
    originalLength,
  };
}

/**
 * Keep both ends of the output. The budget is split 40% head, 60% tail, with
 * a marker counting the omitted characters in between.
 */
export function truncateHeadTail(output: string, maxChars: number): TruncationResult {
  const originalLength = output.length;
  if (maxChars <= 0 || originalLength <= maxChars) {
    return { output, truncated: false, originalLength };
  }
  const headChars = Math.floor(maxChars * 0.4);
  const head = sliceHead(output, headChars);
  const tail = sliceTail(output, maxChars - headChars);
  const omitted = originalLength - head.length - tail.length;
  return {
    output: `${head}\n\n--- [${omitted} characters omitted] ---\n\n${tail}`,
    truncated: true,
    originalLength,
  };
}

export function truncateText(output: string, maxChars: number, direction: TruncateDirection = "tail"): TruncationResult {
  switch (direction) {
    case "head":
      return truncateHead(output, maxChars);
    case "head_tail":
      return truncateHeadTail(output, maxChars);
    case "tail":
      return truncateTail(output, maxChars);
  }
}

// Never split a surrogate pair at the cut
function sliceHead(text: string, count: number): string {
  const end = isHighSurrogate(text.charCodeAt(count - 1)) ? count - 1 : count;
  return text.slice(0, Math.max(end, 0));
}

function sliceTail(text: string, count: number): string {
  if (count <= 0) return "";
  const start = text.length - count;
  return text.slice(isLowSurrogate(text.charCodeAt(start)) ? start + 1 : start);
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}
