import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CommunicationService } from './communication.service';
import { CommunicationLog } from './entities/communication-log.entity';
import { EmailTemplateService } from '../lib/services/email-template.service';
import { EMAIL_NOTIFIERS, Notifier } from './notifiers/notifier.interface';
import { ResendNotifier } from './notifiers/resend.notifier';
import { SmtpNotifier } from './notifiers/smtp.notifier';

@Module({
	imports: [TypeOrmModule.forFeature([CommunicationLog])],
	providers: [
		CommunicationService,
		EmailTemplateService,
		ResendNotifier,
		SmtpNotifier,
		{
			// Order is priority: the HTTP API first, SMTP as fallback
			provide: EMAIL_NOTIFIERS,
			useFactory: (resend: ResendNotifier, smtp: SmtpNotifier): Notifier[] => [resend, smtp],
			inject: [ResendNotifier, SmtpNotifier],
		},
	],
	exports: [CommunicationService],
})
export class CommunicationModule {}
