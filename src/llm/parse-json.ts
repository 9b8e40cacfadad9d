export class ParseResponseError extends Error {
  constructor(message = "Model response did not contain parseable JSON.") {
    super(message);
    this.name = "ParseResponseError";
  }
}

type ParseAttempt = { ok: true; value: unknown } | { ok: false };

function tryParse(text: string): ParseAttempt {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function extractFencedContent(text: string): string | null {
  const match = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
  const content = match?.[1]?.trim();
  return content ? content : null;
}

function extractBracketSlice(text: string, open: string, close: string): string | null {
  const start = text.indexOf(open);
  const end = text.lastIndexOf(close);
  if (start === -1 || end <= start) {
    return null;
  }
  return text.slice(start, end + 1);
}

/**
 * Recovers a JSON value from free-form model output: the whole text, then a
 * fenced block, then the outermost object or array slice.
 */
export function parseJsonFromLlm(raw: string): unknown {
  const trimmed = raw.trim();

  const direct = tryParse(trimmed);
  if (direct.ok) return direct.value;

  const fenced = extractFencedContent(trimmed);
  if (fenced) {
    const parsed = tryParse(fenced);
    if (parsed.ok) return parsed.value;
  }

  const objectSlice = extractBracketSlice(trimmed, "{", "}");
  if (objectSlice) {
    const parsed = tryParse(objectSlice);
    if (parsed.ok) return parsed.value;
  }

  const arraySlice = extractBracketSlice(trimmed, "[", "]");
  if (arraySlice) {
    const parsed = tryParse(arraySlice);
    if (parsed.ok) return parsed.value;
  }

  throw new ParseResponseError();
}
