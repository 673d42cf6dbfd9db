import { User } from '../../users/entities/user.entity';
import { TemplateContext } from '../services/template.service';

export interface MailOptions {
    to: string;
    subject: string;
    text?: string;
    html?: string;
    template?: string;
    context?: TemplateContext;
}

export interface IEmailProvider {
    sendMail(options: MailOptions): Promise<boolean>;
}

export type EmailRecipient = Pick<
    User,
    'id' | 'email' | 'nickname' | 'firstName' | 'verificationToken'
>;

export interface IEmailService {
    sendVerificationEmail(user: EmailRecipient): Promise<boolean>;
    sendAccountLockedEmail(user: EmailRecipient): Promise<boolean>;
}
