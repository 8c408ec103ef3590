/**
 * Prompt Templates
 */

export {
  CLASSIFICATION_PROMPT_TEMPLATE,
  NO_EXAMPLES_TEXT,
  GENERATIVE_CLASSIFICATION_SCHEMA,
} from './classification';
export { APPEAL_PROMPT_TEMPLATE } from './appeal';

/**
 * Replace {{name}} placeholders. Values are inserted literally, so "$" sequences
 * in user text are not treated as replacement patterns.
 */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (placeholder, key: string) =>
    key in values ? values[key] : placeholder
  );
}
