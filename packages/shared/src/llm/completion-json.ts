/**
 * Parsing of JSON completions that may arrive wrapped in Markdown code fences.
 */

export type JsonCompletionResult =
  | { ok: true; value: unknown }
  | { ok: false; error: string };

/**
 * Remove a surrounding ``` / ```json fence, if present.
 */
export function stripCodeFence(content: string): string {
  const trimmed = content.trim();
  if (!trimmed.startsWith('```')) {
    return trimmed;
  }

  // Drop the opening fence together with its language tag
  const body = trimmed.slice(3).replace(/^[a-zA-Z]*[ \t]*\r?\n?/, '');
  const closing = body.indexOf('```');
  return (closing === -1 ? body : body.slice(0, closing)).trim();
}

/**
 * Parse a completion as JSON. Never throws.
 */
export function parseJsonCompletion(content: string): JsonCompletionResult {
  const body = stripCodeFence(content);
  if (body.length === 0) {
    return { ok: false, error: 'empty completion' };
  }

  try {
    return { ok: true, value: JSON.parse(body) };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}
