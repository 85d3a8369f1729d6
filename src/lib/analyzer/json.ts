/**
 * JSON extraction utilities for recovering structured outputs from collaborator text.
 *
 * These helpers only locate and parse the first JSON object in a response; they
 * never evaluate or guess at arbitrary content.
 */

interface ScanState {
  inString: boolean;
  escape: boolean;
}

/**
 * Advance the string/escape state for one character.
 * Returns true when the character is structural (outside a string literal).
 */
function stepScan(state: ScanState, ch: string): boolean {
  if (state.inString) {
    if (state.escape) {
      state.escape = false;
    } else if (ch === "\\") {
      state.escape = true;
    } else if (ch === "\"") {
      state.inString = false;
    }
    return false;
  }
  if (ch === "\"") {
    state.inString = true;
    return false;
  }
  return true;
}

/**
 * Extract the first JSON object substring from arbitrary text.
 * Braces inside quoted strings are ignored.
 */
export function extractFirstJsonObjectFromText(text: string): string | null {
  const raw = String(text ?? "");
  const start = raw.indexOf("{");
  if (start < 0) return null;

  const state: ScanState = { inString: false, escape: false };
  let depth = 0;

  for (let i = start; i < raw.length; i++) {
    const ch = raw[i];
    if (!stepScan(state, ch)) continue;
    if (ch === "{") depth++;
    if (ch === "}") depth--;
    if (depth === 0) return raw.slice(start, i + 1);
  }

  return null;
}

export function tryParseFirstJsonObject(text: string): unknown {
  const jsonStr = extractFirstJsonObjectFromText(text);
  if (!jsonStr) return null;
  try {
    return JSON.parse(jsonStr);
  } catch {
    return null;
  }
}

/**
 * Attempt to repair truncated JSON by closing unclosed arrays/objects.
 *
 * Output cut off at the token limit usually ends mid-item. This keeps everything
 * up to the last complete nested item, closes the open brackets and parses that.
 *
 * Returns null if there is no '{' or the repair does not parse.
 */
export function repairTruncatedJson(text: string): unknown {
  const raw = String(text ?? "").trim();
  const start = raw.indexOf("{");
  if (start < 0) return null;

  try {
    return JSON.parse(raw.slice(start));
  } catch {
    // fall through to repair
  }

  const state: ScanState = { inString: false, escape: false };
  const openBrackets: string[] = [];
  let closersAtLastComplete: string[] | null = null;
  let lastCompleteEnd = -1;

  for (let i = start; i < raw.length; i++) {
    const ch = raw[i];
    if (!stepScan(state, ch)) continue;

    if (ch === "{") openBrackets.push("}");
    if (ch === "[") openBrackets.push("]");
    if (ch === "}" || ch === "]") {
      openBrackets.pop();
      if (openBrackets.length >= 1) {
        lastCompleteEnd = i;
        closersAtLastComplete = [...openBrackets];
      }
    }
  }

  if (lastCompleteEnd < 0 || !closersAtLastComplete) return null;

  const repaired = raw.slice(start, lastCompleteEnd + 1) + closersAtLastComplete.reverse().join("");
  try {
    return JSON.parse(repaired);
  } catch {
    return null;
  }
}

/**
 * Parse a collaborator response: first complete object, else a truncation repair.
 */
export function parseJsonResponse(text: string): unknown {
  const direct = tryParseFirstJsonObject(text);
  if (direct !== null) return direct;
  return repairTruncatedJson(text);
}
