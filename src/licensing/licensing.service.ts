import { BadRequestException, ConflictException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { License } from './entities/license.entity';
import { Activation } from './entities/activation.entity';
import { Contact } from '../contacts/entities/contact.entity';
import { GenerateLicenseDto } from './dto/generate-license.dto';
import { TrialRequestDto } from './dto/trial-request.dto';
import {
	IssuedLicense,
	IssuedTrial,
	LicenseRecord,
	LicenseValidation,
	StatusMessage,
	toIssuedLicense,
	toLicenseRecord,
} from './dto/license-response.dto';
import { DuplicateTrialException } from './lib/exceptions/license.exceptions';
import {
	DAYS_PER_LICENSE_MONTH,
	DEFAULT_LICENSE_MONTHS,
	PlanDefinition,
	TRIAL_PERIOD_DAYS,
	TRIAL_PLAN,
	getPlan,
} from '../lib/constants/license-plans';
import { EmailType } from '../lib/enums/email.enums';
import { DEFAULT_LICENSE_KEY_PREFIX, generateLicenseKey } from '../lib/utils/license-key.util';
import { DEFAULT_LICENSE_TIMEZONE, LicenseDateUtil } from '../lib/utils/license-date.util';
import { isUniqueViolation } from '../lib/utils/query-error.util';
import { emitEmail, serverLimitLabel } from '../lib/utils/email-events.util';
import { EmailDataMap, LicenseDetailsData } from '../lib/types/email-templates.types';

export const DEFAULT_INSTALL_SCRIPT_URL = 'https://noveos.jp/install.sh';

export const normalizeEmail = (email: string): string => email.trim().toLowerCase();

interface NewLicense {
	plan: PlanDefinition;
	customerName: string;
	customerEmail: string;
	days: number;
	note: string | null;
	trialEmail: string | null;
}

@Injectable()
export class LicensingService {
	private readonly logger = new Logger(LicensingService.name);
	private readonly keyPrefix: string;
	private readonly timeZone: string;
	private readonly installScriptUrl: string;

	constructor(
		@InjectRepository(License)
		private readonly licenseRepository: Repository<License>,
		@InjectRepository(Activation)
		private readonly activationRepository: Repository<Activation>,
		@InjectRepository(Contact)
		private readonly contactRepository: Repository<Contact>,
		private readonly eventEmitter: EventEmitter2,
		private readonly configService: ConfigService,
	) {
		this.keyPrefix = this.configService.get<string>('LICENSE_KEY_PREFIX') || DEFAULT_LICENSE_KEY_PREFIX;
		this.timeZone = this.configService.get<string>('LICENSE_TIMEZONE') || DEFAULT_LICENSE_TIMEZONE;
		this.installScriptUrl = this.configService.get<string>('INSTALL_SCRIPT_URL') || DEFAULT_INSTALL_SCRIPT_URL;
	}

	/** Today's date in the licensing time zone, as YYYY-MM-DD. */
	today(): string {
		return LicenseDateUtil.today(this.timeZone);
	}

	async issue(dto: GenerateLicenseDto): Promise<IssuedLicense> {
		const plan = getPlan(dto.plan);
		const months = dto.months ?? DEFAULT_LICENSE_MONTHS;
		if (!Number.isInteger(months) || months < 1) {
			throw new BadRequestException('months must be a positive integer');
		}

		const license = await this.createLicense({
			plan,
			customerName: dto.customer_name,
			customerEmail: normalizeEmail(dto.customer_email),
			days: DAYS_PER_LICENSE_MONTH * months,
			note: dto.note ?? null,
			trialEmail: null,
		});

		this.logger.log(`Issued ${plan.plan} license ${license.key} to ${license.customerEmail}`);

		const details = this.licenseDetails(license, plan);
		emitEmail(this.eventEmitter, EmailType.LICENSE_ISSUED, [license.customerEmail], details);
		this.notifyOperator(EmailType.LICENSE_ISSUED_ADMIN, {
			...details,
			customerEmail: license.customerEmail,
			note: license.note,
		});

		return toIssuedLicense(license);
	}

	/**
	 * Self-service 14-day trial. One per email address: the lookup rejects repeats,
	 * the unique trial_email column rejects concurrent ones.
	 */
	async issueTrial(dto: TrialRequestDto): Promise<IssuedTrial> {
		const email = normalizeEmail(dto.email);
		const company = dto.company?.trim() || null;

		if (await this.hasTrial(email)) {
			this.logger.warn(`Refused duplicate trial request for ${email}`);
			throw new DuplicateTrialException(email);
		}

		const plan = getPlan(TRIAL_PLAN);
		let license: License;
		try {
			license = await this.createLicense({
				plan,
				customerName: dto.name,
				customerEmail: email,
				days: TRIAL_PERIOD_DAYS,
				note: company ? `Trial request from ${company}` : 'Trial request',
				trialEmail: email,
			});
		} catch (error) {
			if (error instanceof ConflictException && (await this.hasTrial(email))) {
				this.logger.warn(`Refused concurrent trial request for ${email}`);
				throw new DuplicateTrialException(email);
			}
			throw error;
		}

		await this.recordTrialContact(dto.name, email, company);
		this.logger.log(`Issued trial license ${license.key} to ${email}`);

		const installCommand = `curl -fsSL ${this.installScriptUrl} | sudo bash -s -- --license ${license.key}`;
		const details = this.licenseDetails(license, plan);
		emitEmail(this.eventEmitter, EmailType.TRIAL_ISSUED, [email], { ...details, installCommand });
		this.notifyOperator(EmailType.TRIAL_ISSUED_ADMIN, { ...details, customerEmail: email, company });

		return { ...toIssuedLicense(license), install_command: installCommand };
	}

	async validate(key: string): Promise<LicenseValidation> {
		const license = await this.findByKey(key);
		const activatedCount = await this.countActivations(license.key);
		const isExpired = LicenseDateUtil.isExpired(license.validUntil, this.today());

		return {
			...toLicenseRecord(license, activatedCount),
			is_expired: isExpired,
			is_valid: license.isActive && !isExpired,
		};
	}

	async revoke(key: string): Promise<StatusMessage> {
		const license = await this.findByKey(key);
		if (license.isActive) {
			await this.licenseRepository.update({ key: license.key }, { isActive: false });
			this.logger.log(`Revoked license ${license.key}`);
		}
		return { status: 'ok', message: `${license.key} has been revoked` };
	}

	async findAll(): Promise<LicenseRecord[]> {
		const licenses = await this.licenseRepository.find({ order: { createdAt: 'DESC', uid: 'DESC' } });
		const rows = await this.activationRepository
			.createQueryBuilder('activation')
			.select('activation.licenseKey', 'licenseKey')
			.addSelect('COUNT(*)', 'count')
			.groupBy('activation.licenseKey')
			.getRawMany<{ licenseKey: string; count: string | number }>();

		const counts = new Map(rows.map((row) => [row.licenseKey, Number(row.count)]));
		return licenses.map((license) => toLicenseRecord(license, counts.get(license.key) ?? 0));
	}

	async findByKey(key: string): Promise<License> {
		const license = await this.licenseRepository.findOneBy({ key });
		if (!license) {
			throw new NotFoundException(`License key not found: ${key}`);
		}
		return license;
	}

	countActivations(key: string): Promise<number> {
		return this.activationRepository.countBy({ licenseKey: key });
	}

	private async createLicense(values: NewLicense): Promise<License> {
		const validFrom = this.today();
		const license = this.licenseRepository.create({
			key: generateLicenseKey(values.plan.plan, this.keyPrefix),
			plan: values.plan.plan,
			customerName: values.customerName,
			customerEmail: values.customerEmail,
			serverLimit: values.plan.serverLimit,
			validFrom,
			validUntil: LicenseDateUtil.addDays(validFrom, values.days),
			isActive: true,
			note: values.note,
			trialEmail: values.trialEmail,
		});

		try {
			await this.licenseRepository.insert(license);
		} catch (error) {
			if (isUniqueViolation(error)) {
				throw new ConflictException('License key generation collided, please retry');
			}
			throw error;
		}
		return license;
	}

	private async hasTrial(email: string): Promise<boolean> {
		const count = await this.licenseRepository.countBy([
			{ trialEmail: email },
			{ customerEmail: email, plan: TRIAL_PLAN },
		]);
		return count > 0;
	}

	private async recordTrialContact(name: string, email: string, company: string | null): Promise<void> {
		try {
			await this.contactRepository.insert({
				userType: 'trial',
				name,
				email,
				company,
				plan: TRIAL_PLAN,
				message: 'Requested a 14-day trial license',
			});
		} catch (error) {
			// The license is already issued at this point
			this.logger.error(`Failed to record trial contact for ${email}`, error instanceof Error ? error.stack : String(error));
		}
	}

	private licenseDetails(license: License, plan: PlanDefinition): LicenseDetailsData {
		return {
			name: license.customerName,
			licenseKey: license.key,
			planName: plan.displayName,
			priceLabel: plan.priceLabel,
			serverLimitLabel: serverLimitLabel(license.serverLimit),
			validFrom: license.validFrom,
			validUntil: license.validUntil,
		};
	}

	private notifyOperator<T extends EmailType.LICENSE_ISSUED_ADMIN | EmailType.TRIAL_ISSUED_ADMIN>(
		emailType: T,
		data: EmailDataMap[T],
	): void {
		const notifyTo = this.configService.get<string>('NOTIFY_TO');
		if (!notifyTo) {
			this.logger.warn(`NOTIFY_TO is not configured, skipping ${emailType} notice`);
			return;
		}
		emitEmail(this.eventEmitter, emailType, [notifyTo], data);
	}
}
