import { Inject, Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { EmailChannel, EmailType } from '../lib/enums/email.enums';
import { EmailDataMap } from '../lib/types/email-templates.types';
import { EmailTemplateService } from '../lib/services/email-template.service';
import { CommunicationLog } from './entities/communication-log.entity';
import { EMAIL_NOTIFIERS, Notifier, OutgoingEmail } from './notifiers/notifier.interface';
import { SEND_EMAIL_EVENT } from '../lib/utils/email-events.util';

export interface EmailDeliveryResult {
	delivered: boolean;
	/** Channel that delivered, or the last one tried. */
	channel: EmailChannel | null;
	skipped: boolean;
}

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

@Injectable()
export class CommunicationService {
	private readonly logger = new Logger(CommunicationService.name);

	constructor(
		@InjectRepository(CommunicationLog)
		private readonly communicationLogRepository: Repository<CommunicationLog>,
		@Inject(EMAIL_NOTIFIERS)
		private readonly notifiers: Notifier[],
		private readonly emailTemplateService: EmailTemplateService,
	) {}

	/**
	 * Handles `send.email` events off the request path. Never throws: failures are
	 * logged and written to communication_logs.
	 */
	@OnEvent(SEND_EMAIL_EVENT, { async: true })
	async sendEmail<T extends EmailType>(
		emailType: T,
		recipientEmails: string[],
		data: EmailDataMap[T],
	): Promise<EmailDeliveryResult> {
		const recipients = (recipientEmails || []).filter((email) => Boolean(email && email.trim()));
		if (recipients.length === 0) {
			this.logger.warn(`No recipients for ${emailType} email, nothing sent`);
			return { delivered: false, channel: null, skipped: true };
		}

		let email: OutgoingEmail;
		try {
			const template = this.emailTemplateService.render(emailType, data);
			email = { to: recipients, subject: template.subject, html: template.body };
		} catch (error) {
			this.logger.error(`Failed to render ${emailType} email: ${errorMessage(error)}`);
			await this.recordDelivery(emailType, recipients, emailType, null, false, errorMessage(error));
			return { delivered: false, channel: null, skipped: false };
		}

		return this.deliver(emailType, email);
	}

	private async deliver(emailType: EmailType, email: OutgoingEmail): Promise<EmailDeliveryResult> {
		const channels = this.notifiers.filter((notifier) => notifier.isConfigured());
		if (channels.length === 0) {
			this.logger.warn(`Mail skip (no channel configured): to=${email.to.join(', ')} subject="${email.subject}"`);
			await this.recordDelivery(emailType, email.to, email.subject, null, false, 'No email channel configured');
			return { delivered: false, channel: null, skipped: true };
		}

		let lastChannel: EmailChannel | null = null;
		let lastError = '';
		for (const notifier of channels) {
			lastChannel = notifier.channel;
			try {
				await notifier.send(email);
				this.logger.log(`Sent ${emailType} email via ${notifier.channel} to ${email.to.join(', ')}`);
				await this.recordDelivery(emailType, email.to, email.subject, notifier.channel, true, null);
				return { delivered: true, channel: notifier.channel, skipped: false };
			} catch (error) {
				lastError = errorMessage(error);
				this.logger.warn(`Sending ${emailType} email via ${notifier.channel} failed: ${lastError}`);
			}
		}

		this.logger.error(`All email channels failed for ${emailType} to ${email.to.join(', ')}: ${lastError}`);
		await this.recordDelivery(emailType, email.to, email.subject, lastChannel, false, lastError);
		return { delivered: false, channel: lastChannel, skipped: false };
	}

	private async recordDelivery(
		emailType: EmailType,
		recipientEmails: string[],
		subject: string,
		channel: EmailChannel | null,
		delivered: boolean,
		error: string | null,
	): Promise<void> {
		try {
			await this.communicationLogRepository.insert({
				emailType,
				recipientEmails,
				subject,
				channel,
				delivered,
				error,
			});
		} catch (logError) {
			this.logger.error(`Failed to record ${emailType} email delivery: ${errorMessage(logError)}`);
		}
	}
}
