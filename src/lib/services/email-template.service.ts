import * as Handlebars from 'handlebars';
import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import juice from 'juice';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EmailType } from '../enums/email.enums';
import { EmailDataMap, EmailTemplate } from '../types/email-templates.types';
import '../templates/handlebars/helpers';

type SubjectBuilders = { [K in EmailType]: (data: EmailDataMap[K], productName: string) => string };

const TEMPLATE_FILES: Record<EmailType, string> = {
	[EmailType.CONTACT_RECEIVED_ADMIN]: 'contacts/received-admin.hbs',
	[EmailType.CONTACT_AUTO_REPLY]: 'contacts/auto-reply.hbs',
	[EmailType.LICENSE_ISSUED]: 'licenses/issued.hbs',
	[EmailType.LICENSE_ISSUED_ADMIN]: 'licenses/issued-admin.hbs',
	[EmailType.LICENSE_EXPIRING]: 'licenses/expiring.hbs',
	[EmailType.TRIAL_ISSUED]: 'trials/issued.hbs',
	[EmailType.TRIAL_ISSUED_ADMIN]: 'trials/issued-admin.hbs',
};

const SUBJECTS: SubjectBuilders = {
	[EmailType.CONTACT_RECEIVED_ADMIN]: (data) => `[Enquiry] ${data.userType} / ${data.name}`,
	[EmailType.CONTACT_AUTO_REPLY]: (_data, productName) => `Thank you for contacting us - ${productName}`,
	[EmailType.LICENSE_ISSUED]: (data, productName) => `[${productName}] Your license key - ${data.planName}`,
	[EmailType.LICENSE_ISSUED_ADMIN]: (data) => `[License issued] ${data.name} / ${data.planName}`,
	[EmailType.LICENSE_EXPIRING]: (data, productName) =>
		`[${productName}] Your license expires on ${data.validUntil}`,
	[EmailType.TRIAL_ISSUED]: (_data, productName) => `[${productName}] Your 14-day trial license`,
	[EmailType.TRIAL_ISSUED_ADMIN]: (data) => `[Trial issued] ${data.name} <${data.customerEmail}>`,
};

@Injectable()
export class EmailTemplateService {
	private readonly logger = new Logger(EmailTemplateService.name);
	private readonly templatesPath: string;
	private readonly compiledTemplates = new Map<string, Handlebars.TemplateDelegate>();
	private readonly productName: string;
	private readonly siteUrl: string;
	private readonly supportEmail: string | undefined;

	constructor(private readonly configService: ConfigService) {
		this.productName = this.configService.get<string>('PRODUCT_NAME') || 'NOVE OS';
		this.siteUrl = this.configService.get<string>('SITE_URL') || 'https://noveos.jp';
		this.supportEmail = this.configService.get<string>('SUPPORT_EMAIL');

		// Sources under ts-jest, dist/ after a build with copied assets
		this.templatesPath = this.findTemplatesPath([
			join(__dirname, '../templates/handlebars'),
			join(process.cwd(), 'dist', 'lib', 'templates', 'handlebars'),
			join(process.cwd(), 'src', 'lib', 'templates', 'handlebars'),
		]);
	}

	private findTemplatesPath(paths: string[]): string {
		const found = paths.find((path) => existsSync(join(path, 'layouts', 'base.hbs')));
		if (!found) {
			this.logger.warn(`No email templates found, tried: ${paths.join(', ')}`);
			return paths[0];
		}
		return found;
	}

	render<T extends EmailType>(type: T, data: EmailDataMap[T]): EmailTemplate {
		const subject = SUBJECTS[type](data, this.productName);
		const context = {
			...data,
			subject,
			productName: this.productName,
			siteUrl: this.siteUrl,
			supportEmail: this.supportEmail,
			currentYear: new Date().getFullYear(),
		};

		const content = this.getTemplate(join('emails', TEMPLATE_FILES[type]))(context);
		const page = this.getTemplate(join('layouts', 'base.hbs'))({
			...context,
			body: new Handlebars.SafeString(content),
		});

		return { subject, body: juice(page) };
	}

	private getTemplate(relativePath: string): Handlebars.TemplateDelegate {
		const cached = this.compiledTemplates.get(relativePath);
		if (cached) {
			return cached;
		}

		const fullPath = join(this.templatesPath, relativePath);
		if (!existsSync(fullPath)) {
			throw new Error(`Template file not found: ${fullPath}`);
		}

		const compiled = Handlebars.compile(readFileSync(fullPath, 'utf8'));
		this.compiledTemplates.set(relativePath, compiled);
		this.logger.debug(`Loaded template: ${relativePath}`);
		return compiled;
	}
}
