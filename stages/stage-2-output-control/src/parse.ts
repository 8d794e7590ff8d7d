/**
 * Extract JSON from raw backend content (handles markdown code blocks and trailing text).
 */

export type ExtractResult =
  | { found: true; json: string }
  | { found: false; reason: string };

const CODE_BLOCK_REGEX = /^```(?:json)?\s*\n?([\s\S]*?)\n?```/;
// 控制字符和格式字符，保留空白
const NON_PRINTABLE = /[^\P{C}\s]/gu;

function findMatchingBracketEnd(
  str: string,
  startIndex: number,
  open: string,
  close: string
): number {
  let depth = 0;
  let inString = false;
  let i = startIndex;
  const len = str.length;
  while (i < len) {
    const c = str[i];
    if (c === "\\" && i + 1 < len) {
      i += 2;
      continue;
    }
    if (c === '"') {
      inString = !inString;
    } else if (!inString && c === open) {
      depth++;
    } else if (!inString && c === close) {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
    i++;
  }
  return -1;
}

/**
 * Strip optional markdown code block (```json ... ``` or ``` ... ```) and return inner text.
 */
export function stripMarkdownCodeBlock(content: string): string {
  const trimmed = content.trim();
  const match = trimmed.match(CODE_BLOCK_REGEX);
  if (match) {
    return match[1].trim();
  }
  return trimmed;
}

/**
 * Candidate cleanup before strict parsing: trim, drop non-printable characters
 * other than whitespace, unwrap a code fence and a leading `json` marker.
 */
export function cleanCandidate(content: string): string {
  let text = content.trim().replace(NON_PRINTABLE, "");
  text = stripMarkdownCodeBlock(text);
  if (text.toLowerCase().startsWith("json")) {
    text = text.slice(4).trimStart();
  }
  return text;
}

/**
 * Extract first JSON object or array from text (handles trailing explanation).
 */
function extractFirstJson(text: string): ExtractResult {
  const objIndex = text.indexOf("{");
  const arrIndex = text.indexOf("[");

  let startIndex: number;
  let endIndex: number;
  if (objIndex >= 0 && (arrIndex < 0 || objIndex <= arrIndex)) {
    startIndex = objIndex;
    endIndex = findMatchingBracketEnd(text, startIndex, "{", "}");
  } else if (arrIndex >= 0) {
    startIndex = arrIndex;
    endIndex = findMatchingBracketEnd(text, startIndex, "[", "]");
  } else {
    return { found: false, reason: "No JSON object or array found in content" };
  }

  if (endIndex < 0) {
    return { found: false, reason: "Unclosed JSON bracket" };
  }

  return { found: true, json: text.slice(startIndex, endIndex + 1) };
}

/**
 * Extract JSON string from raw backend content.
 * If stripMarkdown is true, first strips ```json ... ``` wrapper.
 */
export function extractJson(
  content: string,
  stripMarkdown: boolean = true
): ExtractResult {
  const text = stripMarkdown ? stripMarkdownCodeBlock(content) : content.trim();
  if (!text) {
    return { found: false, reason: "Empty content after strip" };
  }
  return extractFirstJson(text);
}

export type ContainerShape = "array" | "object";

/**
 * Parse a container of the given shape out of free text. Returns undefined
 * when no JSON of that shape can be found.
 */
export function recoverStructure(
  content: string,
  shape: ContainerShape
): unknown[] | Record<string, unknown> | undefined {
  const extract = extractJson(content);
  if (!extract.found) {
    return undefined;
  }
  let data: unknown;
  try {
    data = JSON.parse(extract.json);
  } catch {
    return undefined;
  }
  if (shape === "array") {
    return Array.isArray(data) ? data : undefined;
  }
  if (isPlainObject(data)) {
    return data;
  }
  return undefined;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Uint8Array);
}
