export interface ParsedToolDoc {
  summary: string;
  params: Array<{ name: string; description: string }>;
}

const PARAM_TAG = /^@param(?:\s+\{[^}]*\})?\s+(\[[^\]]*\]|[^\s[\]]+)\s*(?:-\s+|-$)?(.*)$/;

/**
 * Parse a tool documentation block.
 *
 * Lines before the first tag form the summary. `@param` descriptions may
 * continue on following lines; any other tag ends the current parameter and
 * is ignored. Leading `*` gutters are stripped.
 */
export function parseToolDoc(doc: string): ParsedToolDoc {
  const summaryLines: string[] = [];
  const params: ParsedToolDoc["params"] = [];
  let current: { name: string; parts: string[] } | undefined;
  let inTags = false;

  const flush = () => {
    if (current) params.push({ name: current.name, description: current.parts.join(" ").trim() });
    current = undefined;
  };

  for (const raw of doc.split(/\r?\n/)) {
    if (/^\s*(\/\*\*?|\*\/)\s*$/.test(raw)) continue;
    const line = raw.replace(/^\s*\*(?!\*)\s?/, "").trim();

    if (line.startsWith("@")) {
      flush();
      inTags = true;
      const match = PARAM_TAG.exec(line);
      if (match) {
        current = { name: normalizeParamName(match[1]), parts: match[2] ? [match[2]] : [] };
      }
      continue;
    }

    if (current) {
      if (line) current.parts.push(line);
    } else if (!inTags) {
      summaryLines.push(line);
    }
  }
  flush();

  return {
    summary: summaryLines
      .join("\n")
      .replace(/\n{3,}/g, "\n\n")
      .trim(),
    params,
  };
}

// "[unit=celsius]" -> "unit"
function normalizeParamName(token: string): string {
  const bare = token.startsWith("[") ? token.slice(1, -1) : token;
  return bare.split("=")[0].trim();
}
