export interface TextGenerator {
  readonly name: string;
  /** Returns the raw model output; callers parse and validate it. */
  generate(prompt: string): Promise<string>;
}

export const TEXT_GENERATOR = 'TEXT_GENERATOR';
