import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as nodemailer from 'nodemailer';
import {
    IEmailProvider,
    MailOptions,
} from './interfaces/email-provider.interface';
import { TemplateService } from './services/template.service';

@Injectable()
export class MailService implements IEmailProvider, OnModuleInit {
    private readonly logger = new Logger(MailService.name);
    private readonly transporter: nodemailer.Transporter;

    constructor(
        private readonly configService: ConfigService,
        private readonly templateService: TemplateService,
    ) {
        this.transporter = nodemailer.createTransport({
            host: this.configService.get<string>('app.mail.host'),
            port: this.configService.get<number>('app.mail.port'),
            secure:
                this.configService.get<string>('app.mail.encryption') === 'ssl',
            auth: {
                user: this.configService.get<string>('app.mail.auth.user'),
                pass: this.configService.get<string>('app.mail.auth.pass'),
            },
        });
    }

    async onModuleInit(): Promise<void> {
        if (
            this.configService.get<string>('app.general.nodeEnv') ===
            'development'
        ) {
            await this.verifyConnection();
        }
    }

    private async verifyConnection(): Promise<void> {
        try {
            await this.transporter.verify();
            this.logger.log('SMTP connection verified');
        } catch (error) {
            this.logger.error(
                `SMTP connection failed: ${error instanceof Error ? error.message : String(error)}`,
            );
        }
    }

    /**
     * Sends a message; delivery failures are logged and reported as `false`.
     */
    async sendMail(options: MailOptions): Promise<boolean> {
        const { to, subject, template, context, text, html } = options;

        try {
            let htmlContent = html;
            let textContent = text;

            if (template) {
                htmlContent = this.templateService.renderTemplate(
                    template,
                    context ?? {},
                );
                textContent = textContent ?? this.generateTextFromHtml(htmlContent);
            }

            await this.transporter.sendMail({
                from: this.configService.get<string>('app.mail.from'),
                to,
                subject,
                text: textContent ?? '',
                html: htmlContent ?? '',
            });

            this.logger.log(`Email sent to ${to}: ${subject}`);
            return true;
        } catch (error) {
            this.logger.error(
                `Email delivery to ${to} failed: ${error instanceof Error ? error.message : String(error)}`,
            );
            return false;
        }
    }

    private generateTextFromHtml(html: string): string {
        return html
            .replace(/<style[^>]*>.*?<\/style>/gs, '')
            .replace(/<script[^>]*>.*?<\/script>/gs, '')
            .replace(/<[^>]*>/g, '')
            .replace(/\s+/g, ' ')
            .trim();
    }
}
