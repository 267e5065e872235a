import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { errorMessage } from '../common/errors';
import type { AppConfig, OutreachConfig } from '../config/configuration';
import type { OutreachResult } from '../pipeline/interfaces/outreach-result.interface';
import { TEXT_GENERATOR } from './interfaces/text-generator.interface';
import type { TextGenerator } from './interfaces/text-generator.interface';

const GeneratedMessageSchema = z.object({
  subject: z.string().trim().min(1).max(200),
  body: z.string().trim().min(20),
});

export interface ComposedMessage {
  subject: string;
  body: string;
  generatedBy: string;
}

@Injectable()
export class MessageComposer {
  private readonly logger = new Logger(MessageComposer.name);
  private readonly outreach: OutreachConfig;

  constructor(
    configService: ConfigService<AppConfig, true>,
    @Optional()
    @Inject(TEXT_GENERATOR)
    private readonly generator: TextGenerator | null = null,
  ) {
    this.outreach = configService.get('outreach', { infer: true });
  }

  async compose(result: OutreachResult): Promise<ComposedMessage> {
    if (!this.generator) return this.fromTemplate(result);

    try {
      const raw = await this.generator.generate(this.buildPrompt(result));
      const jsonMatch = raw.match(/\{[\s\S]*\}/);
      if (!jsonMatch) throw new Error('No JSON object found in response');

      const parsed = GeneratedMessageSchema.parse(JSON.parse(jsonMatch[0]));
      return { ...parsed, generatedBy: this.generator.name };
    } catch (error: unknown) {
      this.logger.warn(
        `Generated message rejected for ${result.organizationKey}, using template: ${errorMessage(error)}`,
      );
      return this.fromTemplate(result);
    }
  }

  buildPrompt(result: OutreachResult): string {
    const context = {
      recipient: {
        name: result.bestContact?.fullName ?? 'NOT_AVAILABLE',
        title: result.bestContact?.title ?? 'NOT_AVAILABLE',
        email: result.bestEmail,
      },
      organization: { name: result.organization.name, domain: result.domain },
      sender: {
        name: this.outreach.senderName,
        email: this.outreach.senderEmail ?? 'NOT_AVAILABLE',
        pitch: this.outreach.pitch,
      },
    };
    return `Write an outreach email for this context: ${JSON.stringify(context)}`;
  }

  fromTemplate(result: OutreachResult): ComposedMessage {
    const organization = result.organization.name;
    const contact = result.bestContact;
    const greeting = contact ? `Hi ${contact.firstName},` : 'Hello,';
    const opener = contact?.title
      ? `I came across your work as ${contact.title} at ${organization} and wanted to reach out.`
      : `I wanted to reach out to the team at ${organization}.`;

    return {
      subject: `Reaching out to ${organization}`,
      body: [greeting, '', `${opener} ${this.outreach.pitch}`, '', 'Best regards,', this.outreach.senderName].join(
        '\n',
      ),
      generatedBy: 'template',
    };
  }
}
