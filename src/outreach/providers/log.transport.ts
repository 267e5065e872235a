import { Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import type {
  OutgoingMessage,
  SendReceipt,
  SendTransport,
} from '../interfaces/send-transport.interface';

/** Writes messages to the log instead of delivering them. */
export class LogTransport implements SendTransport {
  readonly name = 'log';
  private readonly logger = new Logger(LogTransport.name);

  send(message: OutgoingMessage): Promise<SendReceipt> {
    const messageId = `log-${uuidv4()}`;
    this.logger.log(`[${messageId}] To: ${message.to} | Subject: ${message.subject}`);
    this.logger.debug(message.body);
    return Promise.resolve({ success: true, messageId });
  }
}
