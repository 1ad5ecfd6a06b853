export interface JsonCandidate {
  value: Record<string, unknown>;
  /** Length of the source text the object was parsed from. */
  size: number;
}

/**
 * Every JSON object that can be pulled out of an LLM reply, in the order
 * they appear. Handles bare JSON, markdown code fences and prose before or
 * after the payload, including prose with braces or small JSON examples of
 * its own. Objects nested inside a parsed candidate are not listed again.
 */
export function extractJsonCandidates(raw: string): JsonCandidate[] {
  const trimmed = raw.trim();
  const direct = tryParseObject(trimmed);
  if (direct) return [{ value: direct, size: trimmed.length }];

  const candidates: JsonCandidate[] = [];

  // ```json ... ``` or ``` ... ```
  const fenceMatch = raw.match(/```(?:json)?\s*\n?([\s\S]*?)\n?\s*```/);
  if (fenceMatch) {
    const fencedText = fenceMatch[1].trim();
    const fenced = tryParseObject(fencedText);
    if (fenced) candidates.push({ value: fenced, size: fencedText.length });
  }

  let start = raw.indexOf("{");
  while (start !== -1) {
    const end = findClosingBrace(raw, start);
    const candidate = end === -1 ? null : tryParseObject(raw.slice(start, end + 1));
    if (candidate) {
      candidates.push({ value: candidate, size: end + 1 - start });
      start = raw.indexOf("{", end + 1);
    } else {
      start = raw.indexOf("{", start + 1);
    }
  }

  return candidates;
}

function tryParseObject(text: string): Record<string, unknown> | null {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return null;
  }
  return isPlainObject(value) ? value : null;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Index of the brace that closes the one at `start`, skipping braces inside strings. */
function findClosingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}
