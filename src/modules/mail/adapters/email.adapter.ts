import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { INJECTION_TOKENS } from '../../../common/constants/injection-tokens';
import {
  EmailRecipient,
  IEmailProvider,
  IEmailService,
} from '../interfaces/email-provider.interface';

export const EMAIL_SUBJECTS = {
  verification: 'Verify Your Account',
  accountLocked: 'Account Locked Notification',
} as const;

@Injectable()
export class EmailAdapter implements IEmailService {
  private readonly logger = new Logger(EmailAdapter.name);
  private readonly appName: string;
  private readonly serverBaseUrl: string;

  constructor(
    @Inject(INJECTION_TOKENS.EMAIL_PROVIDER)
    private readonly emailProvider: IEmailProvider,
    private readonly configService: ConfigService,
  ) {
    this.appName = this.configService.get<string>(
      'app.general.name',
      'User Accounts',
    );
    this.serverBaseUrl = this.configService
      .get<string>('app.general.serverBaseUrl', '')
      .replace(/\/+$/, '');
  }

  buildVerificationUrl(user: Pick<EmailRecipient, 'id' | 'verificationToken'>): string {
    return `${this.serverBaseUrl}/verify-email/${user.id}/${user.verificationToken ?? ''}`;
  }

  async sendVerificationEmail(user: EmailRecipient): Promise<boolean> {
    if (!user.verificationToken) {
      this.logger.warn(`No verification token for user ${user.id}, email skipped`);
      return false;
    }

    return this.emailProvider.sendMail({
      to: user.email,
      subject: EMAIL_SUBJECTS.verification,
      template: 'email-verification',
      context: {
        name: user.firstName || user.nickname,
        verificationUrl: this.buildVerificationUrl(user),
        email: user.email,
        appName: this.appName,
      },
    });
  }

  async sendAccountLockedEmail(user: EmailRecipient): Promise<boolean> {
    return this.emailProvider.sendMail({
      to: user.email,
      subject: EMAIL_SUBJECTS.accountLocked,
      template: 'account-locked',
      context: {
        name: user.firstName || user.nickname,
        appName: this.appName,
      },
    });
  }
}
