import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs/promises';
import * as handlebars from 'handlebars';
import * as path from 'path';

export type TemplateContext = Record<string, unknown>;

const TEMPLATE_EXTENSION = '.hbs';

@Injectable()
export class TemplateService implements OnModuleInit {
    private readonly logger = new Logger(TemplateService.name);
    private readonly templatesPath: string;
    private readonly renderer = handlebars.create();
    private compiledTemplates = new Map<string, handlebars.TemplateDelegate>();

    constructor(private readonly configService: ConfigService) {
        const configured = this.configService.get<string>(
            'app.mail.templatesDir',
            path.join('src', 'modules', 'mail', 'templates'),
        );
        this.templatesPath = path.isAbsolute(configured)
            ? configured
            : path.join(process.cwd(), configured);
    }

    async onModuleInit(): Promise<void> {
        this.registerHelpers();
        await this.loadTemplates();
    }

    /**
     * Compiles every `*.hbs` file of the templates directory, keyed by file name.
     */
    async loadTemplates(): Promise<void> {
        const files = await fs.readdir(this.templatesPath);
        const templateFiles = files.filter((file) =>
            file.endsWith(TEMPLATE_EXTENSION),
        );

        for (const file of templateFiles) {
            const content = await fs.readFile(
                path.join(this.templatesPath, file),
                'utf-8',
            );
            this.compiledTemplates.set(
                path.basename(file, TEMPLATE_EXTENSION),
                this.renderer.compile(content),
            );
        }

        this.logger.log(
            `${templateFiles.length} email templates loaded from ${this.templatesPath}`,
        );
    }

    renderTemplate(templateName: string, context: TemplateContext): string {
        const template = this.compiledTemplates.get(templateName);
        if (!template) {
            throw new Error(`Template '${templateName}' not found`);
        }

        return template({
            appName: this.configService.get<string>(
                'app.general.name',
                'User Accounts',
            ),
            currentYear: new Date().getFullYear(),
            ...context,
        });
    }

    private registerHelpers(): void {
        this.renderer.registerHelper('capitalize', (value: unknown) => {
            if (typeof value !== 'string' || value.length === 0) return '';
            return value.charAt(0).toUpperCase() + value.slice(1);
        });
    }
}
