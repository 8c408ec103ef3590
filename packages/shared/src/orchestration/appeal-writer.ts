/**
 * Appeal Letter Drafting
 */

import { config } from '../config';
import type { TextGenerator } from '../llm/types';
import { sanitizePromptInput } from '../security';
import { APPEAL_PROMPT_TEMPLATE, fillTemplate } from '../templates';
import type { AppealRequest } from '../types';

export function buildAppealPrompt(request: AppealRequest): string {
  const apartment = sanitizePromptInput(request.apartment, 20);

  return fillTemplate(APPEAL_PROMPT_TEMPLATE, {
    problem_text: sanitizePromptInput(request.problem_text),
    street: sanitizePromptInput(request.address, 200),
    building: sanitizePromptInput(request.building, 50),
    apartment: apartment ? `, кв. ${apartment}` : '',
  });
}

/**
 * Draft the formal letter for a complaint. Generation failures propagate.
 */
export async function draftAppeal(
  generator: TextGenerator,
  request: AppealRequest,
  temperature: number = config.appealTemperature
): Promise<string> {
  const letter = await generator.generate(buildAppealPrompt(request), temperature);
  return letter.trim();
}
