export type ToolArguments = Record<string, unknown>;

/**
 * Parses the raw argument payload of a tool call.
 * Anything that is not a JSON object (malformed text, arrays, scalars)
 * becomes an empty mapping so the conversation can keep going.
 */
export function parseToolArguments(argumentText: string | undefined): ToolArguments {
  if (!argumentText || argumentText.trim().length === 0) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(argumentText);
  } catch {
    return {};
  }

  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    return {};
  }

  return Object.fromEntries(Object.entries(parsed));
}
