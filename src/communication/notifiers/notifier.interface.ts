import { EmailChannel } from '../../lib/enums/email.enums';

export const EMAIL_NOTIFIERS = Symbol('EMAIL_NOTIFIERS');

export interface OutgoingEmail {
	to: string[];
	subject: string;
	html: string;
}

/**
 * One outbound email channel. Channels are tried in order until one delivers.
 */
export interface Notifier {
	readonly channel: EmailChannel;
	isConfigured(): boolean;
	send(email: OutgoingEmail): Promise<void>;
}
