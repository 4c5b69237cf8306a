import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { License } from './entities/license.entity';
import { LicensingService } from './licensing.service';
import { EmailType } from '../lib/enums/email.enums';
import { getPlan } from '../lib/constants/license-plans';
import { LicenseDateUtil } from '../lib/utils/license-date.util';
import { emitEmail } from '../lib/utils/email-events.util';

export const DEFAULT_REMINDER_DAYS = [7, 1];

export function parseReminderDays(value: string | undefined): number[] {
	if (!value) {
		return DEFAULT_REMINDER_DAYS;
	}
	const days = value
		.split(',')
		.map((part) => Number(part.trim()))
		.filter((day) => Number.isInteger(day) && day > 0);
	return [...new Set(days)];
}

@Injectable()
export class LicensingNotificationsService {
	private readonly logger = new Logger(LicensingNotificationsService.name);
	private readonly reminderDays: number[];

	constructor(
		@InjectRepository(License)
		private readonly licenseRepository: Repository<License>,
		private readonly licensingService: LicensingService,
		private readonly eventEmitter: EventEmitter2,
		private readonly configService: ConfigService,
	) {
		this.reminderDays = parseReminderDays(this.configService.get<string>('LICENSE_EXPIRY_REMINDER_DAYS'));
	}

	/** Emails holders of active licenses that expire exactly N days from today. Returns how many were queued. */
	@Cron(CronExpression.EVERY_DAY_AT_9AM)
	async checkExpiringLicenses(today: string = this.licensingService.today()): Promise<number> {
		if (this.reminderDays.length === 0) {
			return 0;
		}

		const targetDates = this.reminderDays.map((days) => LicenseDateUtil.addDays(today, days));
		const licenses = await this.licenseRepository.find({
			where: { isActive: true, validUntil: In(targetDates) },
		});

		for (const license of licenses) {
			emitEmail(this.eventEmitter, EmailType.LICENSE_EXPIRING, [license.customerEmail], {
				name: license.customerName,
				licenseKey: license.key,
				planName: getPlan(license.plan).displayName,
				validUntil: license.validUntil,
				daysRemaining: LicenseDateUtil.daysUntil(license.validUntil, today),
			});
		}

		this.logger.log(`Queued ${licenses.length} expiry reminder(s) for ${targetDates.join(', ')}`);
		return licenses.length;
	}
}
