/**
 * Prompt Input Sanitization
 *
 * Citizen text is embedded into generative prompts. Instruction-override
 * phrases are replaced with a marker before any prompt is built.
 */

export const FILTERED_MARKER = '[FILTERED]';

export const DEFAULT_PROMPT_INPUT_MAX_LENGTH = 2000;

const INSTRUCTION_OVERRIDE_PATTERNS: RegExp[] = [
  /\bignore\s+(?:all\s+)?(?:previous|above|prior)\s+instructions?\b/gi,
  /\bsystem\s*:/gi,
  /\bassistant\s*:/gi,
  /\bnew\s+instructions?\b/gi,
  /\byou\s+are\s+now\b/gi,
  /\bact\s+as\b/gi,
  /\bpretend\s+to\s+be\b/gi,
];

/**
 * Sanitize user input before passing it to an LLM prompt.
 */
export function sanitizePromptInput(
  text: string | null | undefined,
  maxLength: number = DEFAULT_PROMPT_INPUT_MAX_LENGTH
): string {
  if (!text) {
    return '';
  }

  let sanitized = text.slice(0, maxLength);

  // Keep at most two consecutive newlines
  sanitized = sanitized.replace(/\n{3,}/g, '\n\n');

  for (const pattern of INSTRUCTION_OVERRIDE_PATTERNS) {
    sanitized = sanitized.replace(pattern, FILTERED_MARKER);
  }

  return sanitized.trim();
}
