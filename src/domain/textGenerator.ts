/**
 * Anything that turns a prompt into text.
 * Implementations throw a GenerationError subclass on failure and never retry.
 */
export interface TextGenerator {
  generate(prompt: string): Promise<string>;
}
