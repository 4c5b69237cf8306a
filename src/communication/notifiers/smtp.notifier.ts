import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as nodemailer from 'nodemailer';
import { EmailChannel } from '../../lib/enums/email.enums';
import { Notifier, OutgoingEmail } from './notifier.interface';

@Injectable()
export class SmtpNotifier implements Notifier {
	readonly channel = EmailChannel.SMTP;
	private readonly logger = new Logger(SmtpNotifier.name);
	private readonly user: string;
	private readonly transporter: nodemailer.Transporter;

	constructor(private readonly configService: ConfigService) {
		this.user = this.configService.get<string>('SMTP_USER') || '';
		const port = Number(this.configService.get<string>('SMTP_PORT') || 587);

		this.transporter = nodemailer.createTransport({
			host: this.configService.get<string>('SMTP_HOST') || 'smtp.gmail.com',
			port,
			secure: port === 465,
			auth: {
				user: this.user,
				pass: this.configService.get<string>('SMTP_PASS') || '',
			},
		});
	}

	isConfigured(): boolean {
		return Boolean(this.user && this.configService.get<string>('SMTP_PASS'));
	}

	async send(email: OutgoingEmail): Promise<void> {
		const fromName = this.configService.get<string>('EMAIL_FROM_NAME');
		const result = await this.transporter.sendMail({
			from: fromName ? `"${fromName}" <${this.user}>` : this.user,
			to: email.to,
			subject: email.subject,
			html: email.html,
		});
		this.logger.debug(`SMTP accepted "${email.subject}" as ${result.messageId}`);
	}
}
