/**
 * Upstream capability contracts. The classification and routing core only
 * depends on these interfaces; OpenAI implementations live in ./openai.
 */

export interface EmbeddingClient {
  /** Model identifier, for logs and metrics */
  readonly model: string;
  embed(text: string): Promise<number[]>;
}

export interface TextGenerator {
  readonly model: string;
  /**
   * Generate a completion for a single-turn prompt.
   * Rejects with UpstreamCapabilityError when the completion is empty.
   */
  generate(prompt: string, temperature: number): Promise<string>;
}
