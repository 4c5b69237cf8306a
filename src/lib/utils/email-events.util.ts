import { EventEmitter2 } from '@nestjs/event-emitter';
import { EmailType } from '../enums/email.enums';
import { EmailDataMap } from '../types/email-templates.types';

export const SEND_EMAIL_EVENT = 'send.email';

/**
 * Queues an email for the communication module. Returns immediately; delivery
 * happens in the async `send.email` listener.
 */
export function emitEmail<T extends EmailType>(
	eventEmitter: EventEmitter2,
	emailType: T,
	recipients: string[],
	data: EmailDataMap[T],
): void {
	eventEmitter.emit(SEND_EMAIL_EVENT, emailType, recipients, data);
}

export const serverLimitLabel = (serverLimit: number): string =>
	serverLimit === 0 ? 'Unlimited' : `${serverLimit} server${serverLimit === 1 ? '' : 's'}`;
