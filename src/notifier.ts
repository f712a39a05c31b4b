import { Logger } from './logger';

export interface SendResult {
  success: boolean;
  messageId?: string;
  error?: string;
}

/** Delivers a reminder text to one owner over whatever channel the deployment uses. */
export interface Notifier {
  send(recipientId: string, text: string): Promise<SendResult>;
}

/** Writes reminders to the log instead of delivering them. Used by the CLI worker. */
export class LogNotifier implements Notifier {
  private sent = 0;

  constructor(private logger: Logger) {}

  async send(recipientId: string, text: string): Promise<SendResult> {
    this.sent++;
    const messageId = `log-${this.sent}`;
    this.logger.info({ recipientId, messageId }, text);
    return { success: true, messageId };
  }
}
