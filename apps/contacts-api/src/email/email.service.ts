/**
 * Email Service
 * Posts outbound mail to an HTTP mail relay
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { firstValueFrom } from 'rxjs';
import { CONFIRMATION_SUBJECT, renderConfirmationEmail } from './confirmation-email';

export interface OutboundEmail {
  from: string;
  to: string;
  subject: string;
  html: string;
}

@Injectable()
export class EmailService {
  private readonly logger = new Logger(EmailService.name);
  private readonly relayUrl?: string;
  private readonly from: string;
  private readonly publicUrl: string;

  constructor(
    private httpService: HttpService,
    private configService: ConfigService,
  ) {
    this.relayUrl = this.configService.get<string>('mailRelayUrl');
    this.from = this.configService.get<string>('mailFrom') ?? 'no-reply@contactbook.local';
    this.publicUrl = (this.configService.get<string>('publicUrl') ?? 'http://localhost:8000').replace(/\/+$/, '');
  }

  /**
   * Send the email-confirmation link for `username` to `address`.
   * Rejects when the relay refuses the message; callers do not await it.
   */
  async sendConfirmation(username: string, address: string, token: string): Promise<void> {
    const link = `${this.publicUrl}/auth/confirmed_email/${encodeURIComponent(token)}`;

    await this.send({
      from: this.from,
      to: address,
      subject: CONFIRMATION_SUBJECT,
      html: renderConfirmationEmail({ username, link }),
    });
  }

  private async send(email: OutboundEmail): Promise<void> {
    if (!this.relayUrl) {
      this.logger.warn(`MAIL_RELAY_URL not set, dropping '${email.subject}' to ${email.to}`);
      return;
    }

    await firstValueFrom(
      this.httpService.post(this.relayUrl, email, {
        headers: { 'Content-Type': 'application/json' },
        timeout: 10000, // 10 seconds
      }),
    );

    this.logger.log(`Email '${email.subject}' sent to ${email.to}`);
  }
}
