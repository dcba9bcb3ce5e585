/**
 * Turns free-text model output into a bare locator string.
 *
 * This is a best-effort extraction, not a parser: when nothing recognisable is
 * found the (trimmed) input comes back unchanged. The syntactic validity of the
 * result is never checked; using the locator is the only real test.
 */

function stripChars(s: string, chars: string): string {
  let start = 0;
  let end = s.length;
  while (start < end && chars.includes(s[start])) start++;
  while (end > start && chars.includes(s[end - 1])) end--;
  return s.slice(start, end);
}

function unquote(s: string): string {
  return stripChars(s, `"'`);
}

function dropCodeFence(s: string): string {
  const firstNewline = s.indexOf("\n");
  if (firstNewline === -1) {
    return s.replaceAll("```", "").trim();
  }
  // everything up to the first newline is the fence plus its language tag
  let body = s.slice(firstNewline + 1);
  if (body.endsWith("```")) body = body.slice(0, -3);
  return body.trim();
}

function extractFromJson(s: string): string {
  try {
    const data: unknown = JSON.parse(s);
    if (typeof data === "object" && data !== null && !Array.isArray(data) && "locator" in data) {
      return String(data.locator);
    }
    return s;
  } catch {
    const field = /"locator"\s*:\s*"([^"]+)"/.exec(s);
    if (field) return field[1];
    const quoted = /["']([^"']+)["']/.exec(s);
    return quoted ? quoted[1] : s;
  }
}

export function cleanAIResponse(raw: string): string {
  if (!raw) return "";

  let s = raw.trim();

  if (s.startsWith("```")) {
    s = dropCodeFence(s);
  }

  s = stripChars(s, "`");
  s = unquote(s);

  if (s.startsWith("{") && s.endsWith("}")) {
    s = extractFromJson(s);
  }

  // "Locator: #submit" style answers
  if (s.toLowerCase().includes("locator:")) {
    s = unquote(s.slice(s.indexOf(":") + 1).trim());
  }

  if (s.includes("\n")) {
    s = s.split("\n")[0].trim();
  }

  return s.trim();
}
