import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosInstance } from 'axios';
import { EmailChannel } from '../../lib/enums/email.enums';
import { Notifier, OutgoingEmail } from './notifier.interface';

export const RESEND_API_URL = 'https://api.resend.com';

interface ResendSendResponse {
	id?: string;
}

@Injectable()
export class ResendNotifier implements Notifier {
	readonly channel = EmailChannel.RESEND;
	private readonly logger = new Logger(ResendNotifier.name);
	private readonly apiKey: string;
	private readonly from: string;
	private readonly client: AxiosInstance;

	constructor(private readonly configService: ConfigService) {
		this.apiKey = this.configService.get<string>('RESEND_API_KEY') || '';
		const fromAddress = this.configService.get<string>('EMAIL_FROM') || '';
		const fromName = this.configService.get<string>('EMAIL_FROM_NAME');
		this.from = fromName && fromAddress ? `${fromName} <${fromAddress}>` : fromAddress;

		this.client = axios.create({
			baseURL: RESEND_API_URL,
			timeout: 10000,
			headers: {
				Authorization: `Bearer ${this.apiKey}`,
				'Content-Type': 'application/json',
			},
		});
	}

	isConfigured(): boolean {
		return Boolean(this.apiKey && this.from);
	}

	async send(email: OutgoingEmail): Promise<void> {
		const response = await this.client.post<ResendSendResponse>('/emails', {
			from: this.from,
			to: email.to,
			subject: email.subject,
			html: email.html,
		});
		this.logger.debug(`Resend accepted "${email.subject}" as ${response.data.id ?? 'unknown id'}`);
	}
}
