import { Logger } from '@nestjs/common';
import { GoogleGenerativeAI } from '@google/generative-ai';
import type { GenerativeModel } from '@google/generative-ai';
import { errorMessage } from '../../common/errors';
import type { TextGenerator } from '../interfaces/text-generator.interface';

export class GeminiTextGenerator implements TextGenerator {
  readonly name = 'gemini';
  private readonly logger = new Logger(GeminiTextGenerator.name);
  private readonly model: GenerativeModel;

  constructor(apiKey: string) {
    const genAI = new GoogleGenerativeAI(apiKey);
    this.model = genAI.getGenerativeModel({
      model: 'gemini-2.0-flash',
      systemInstruction: `
                You write short, personal first-contact emails to recruiters and
                hiring managers on behalf of a job seeker.

                RULES:
                - Address the recipient by first name.
                - Mention the organization by name exactly once.
                - At most 120 words in the body, no more than one question.
                - Never invent facts about the recipient or the organization.
                - Sign off with the sender name provided.

                OUTPUT FORMAT (JSON ONLY):
                {
                  "subject": "string, under 80 characters",
                  "body": "plain text email body"
                }
            `,
      generationConfig: {
        responseMimeType: 'application/json',
      },
    });
  }

  async generate(prompt: string): Promise<string> {
    try {
      const result = await this.model.generateContent(prompt);
      return result.response.text().trim();
    } catch (error: unknown) {
      this.logger.error(`TEXT_GENERATION_ERROR: ${errorMessage(error)}`);
      throw error; // Composer falls back to the template
    }
  }
}
