export interface OutgoingMessage {
  to: string;
  subject: string;
  body: string;
}

export interface SendReceipt {
  success: boolean;
  messageId?: string;
  error?: string;
}

export interface SendTransport {
  readonly name: string;
  send(message: OutgoingMessage): Promise<SendReceipt>;
}

export const SEND_TRANSPORT = 'SEND_TRANSPORT';
