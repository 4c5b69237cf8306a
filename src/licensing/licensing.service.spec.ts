import { Test, TestingModule } from '@nestjs/testing';
import { BadRequestException, ConflictException, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { TypeOrmModule, getRepositoryToken } from '@nestjs/typeorm';
import { QueryFailedError, Repository } from 'typeorm';
import { LicensingService } from './licensing.service';
import { License } from './entities/license.entity';
import { Activation } from './entities/activation.entity';
import { Contact } from '../contacts/entities/contact.entity';
import { DuplicateTrialException } from './lib/exceptions/license.exceptions';
import { EmailType } from '../lib/enums/email.enums';
import { SubscriptionPlan } from '../lib/enums/license.enums';
import { LicenseDateUtil } from '../lib/utils/license-date.util';
import { SEND_EMAIL_EVENT } from '../lib/utils/email-events.util';
import { eventEmitterMockFactory } from '../../test/utils/mock-factory';
import { testingConfigService, testingDatabaseModule } from '../../test/utils/testing-database';

const KEY_PATTERN = /^NOVE-[A-Z0-9]{3}-[0-9A-F]{4}-[0-9A-F]{4}-[0-9A-F]{4}$/;

describe('LicensingService', () => {
	let module: TestingModule;
	let service: LicensingService;
	let licenseRepository: Repository<License>;
	let activationRepository: Repository<Activation>;
	let contactRepository: Repository<Contact>;
	let eventEmitter: ReturnType<typeof eventEmitterMockFactory>;

	const compile = async (config: Record<string, string | undefined> = {}) => {
		eventEmitter = eventEmitterMockFactory();
		module = await Test.createTestingModule({
			imports: [testingDatabaseModule(), TypeOrmModule.forFeature([License, Activation, Contact])],
			providers: [
				LicensingService,
				{ provide: EventEmitter2, useValue: eventEmitter },
				{ provide: ConfigService, useValue: testingConfigService(config) },
			],
		}).compile();

		service = module.get(LicensingService);
		licenseRepository = module.get(getRepositoryToken(License));
		activationRepository = module.get(getRepositoryToken(Activation));
		contactRepository = module.get(getRepositoryToken(Contact));
	};

	const seedLicense = async (overrides: Partial<License> = {}): Promise<License> => {
		const license = licenseRepository.create({
			key: 'NOVE-PER-AAAA-BBBB-CCCC',
			plan: SubscriptionPlan.PERSONAL,
			customerName: 'Example Corp',
			customerEmail: 'ops@example.com',
			serverLimit: 3,
			validFrom: '2024-01-01',
			validUntil: LicenseDateUtil.addDays(service.today(), 10),
			isActive: true,
			note: null,
			trialEmail: null,
			...overrides,
		});
		await licenseRepository.insert(license);
		return license;
	};

	beforeEach(() => compile());

	afterEach(() => module.close());

	describe('issue', () => {
		it('issues a startup license for one month', async () => {
			const today = service.today();

			const result = await service.issue({
				plan: 'startup',
				customer_name: 'Example Corp',
				customer_email: 'ops@example.com',
				months: 1,
			});

			expect(result).toEqual({
				status: 'ok',
				license_key: expect.stringMatching(/^NOVE-STA-/),
				plan: 'Startup',
				customer_email: 'ops@example.com',
				valid_from: today,
				valid_until: LicenseDateUtil.addDays(today, 30),
				server_limit: 50,
			});
			expect(result.license_key).toMatch(KEY_PATTERN);

			const stored = await licenseRepository.findOneBy({ key: result.license_key });
			expect(stored?.plan).toBe(SubscriptionPlan.STARTUP);
			expect(stored?.isActive).toBe(true);
			expect(stored?.trialEmail).toBeNull();
		});

		it('defaults to twelve months of 30 days', async () => {
			const result = await service.issue({
				plan: 'personal',
				customer_name: 'Example Corp',
				customer_email: 'ops@example.com',
			});

			expect(result.valid_until).toBe(LicenseDateUtil.addDays(service.today(), 360));
			expect(result.server_limit).toBe(3);
		});

		it('rejects unknown plans without writing anything', async () => {
			await expect(
				service.issue({ plan: 'platinum', customer_name: 'X', customer_email: 'x@example.com' }),
			).rejects.toThrow(BadRequestException);
			expect(await licenseRepository.count()).toBe(0);
		});

		it('rejects a non-positive month count', async () => {
			await expect(
				service.issue({ plan: 'personal', customer_name: 'X', customer_email: 'x@example.com', months: 0 }),
			).rejects.toThrow('months must be a positive integer');
		});

		it('stores the customer email in lower case', async () => {
			const result = await service.issue({
				plan: 'personal',
				customer_name: 'Jane Doe',
				customer_email: ' Jane@Example.com',
			});

			expect(result.customer_email).toBe('jane@example.com');
			expect(await licenseRepository.countBy({ customerEmail: 'jane@example.com' })).toBe(1);
		});

		it('surfaces a key collision as a conflict without writing or emailing', async () => {
			const keyTaken = Object.assign(new Error('UNIQUE constraint failed: licenses.license_key'), {
				code: 'SQLITE_CONSTRAINT_UNIQUE',
			});
			const insert = jest
				.spyOn(licenseRepository, 'insert')
				.mockRejectedValueOnce(new QueryFailedError('INSERT', [], keyTaken));

			await expect(
				service.issue({ plan: 'startup', customer_name: 'Example Corp', customer_email: 'ops@example.com' }),
			).rejects.toThrow(new ConflictException('License key generation collided, please retry'));

			expect(insert).toHaveBeenCalledTimes(1);
			expect(await licenseRepository.count()).toBe(0);
			expect(eventEmitter.emit).not.toHaveBeenCalled();
		});

		it('queues the customer email and the operator notice', async () => {
			const result = await service.issue({
				plan: 'academic',
				customer_name: 'Example University',
				customer_email: 'it@example.edu',
				note: 'PO 42',
			});

			expect(eventEmitter.emit).toHaveBeenCalledTimes(2);
			expect(eventEmitter.emit).toHaveBeenCalledWith(
				SEND_EMAIL_EVENT,
				EmailType.LICENSE_ISSUED,
				['it@example.edu'],
				expect.objectContaining({
					name: 'Example University',
					licenseKey: result.license_key,
					planName: 'Academic',
					serverLimitLabel: '10 servers',
				}),
			);
			expect(eventEmitter.emit).toHaveBeenCalledWith(
				SEND_EMAIL_EVENT,
				EmailType.LICENSE_ISSUED_ADMIN,
				['ops@example.com'],
				expect.objectContaining({ customerEmail: 'it@example.edu', note: 'PO 42' }),
			);
		});

		it('skips the operator notice when no operator mailbox is configured', async () => {
			await module.close();
			await compile({ NOTIFY_TO: undefined });

			await service.issue({ plan: 'personal', customer_name: 'X', customer_email: 'x@example.com' });

			expect(eventEmitter.emit).toHaveBeenCalledTimes(1);
			expect(eventEmitter.emit).toHaveBeenCalledWith(
				SEND_EMAIL_EVENT,
				EmailType.LICENSE_ISSUED,
				['x@example.com'],
				expect.any(Object),
			);
		});
	});

	describe('issueTrial', () => {
		it('issues a one-server license valid for 14 days with an install command', async () => {
			const today = service.today();

			const result = await service.issueTrial({ name: 'Jane Doe', email: 'jane@example.com', company: 'Example Corp' });

			expect(result).toEqual({
				status: 'ok',
				license_key: expect.stringMatching(/^NOVE-TRI-/),
				plan: '14-Day Trial',
				customer_email: 'jane@example.com',
				valid_from: today,
				valid_until: LicenseDateUtil.addDays(today, 14),
				server_limit: 1,
				install_command: `curl -fsSL https://noveos.jp/install.sh | sudo bash -s -- --license ${result.license_key}`,
			});
		});

		it('records the request as a trial contact', async () => {
			await service.issueTrial({ name: 'Jane Doe', email: 'jane@example.com', company: 'Example Corp' });

			const contacts = await contactRepository.find();
			expect(contacts).toHaveLength(1);
			expect(contacts[0]).toMatchObject({
				userType: 'trial',
				name: 'Jane Doe',
				email: 'jane@example.com',
				company: 'Example Corp',
				plan: 'trial14',
			});
		});

		it('normalises the email before the duplicate check', async () => {
			await service.issueTrial({ name: 'Jane Doe', email: 'jane@example.com' });

			await expect(service.issueTrial({ name: 'Jane Doe', email: '  JANE@Example.com ' })).rejects.toThrow(
				DuplicateTrialException,
			);
			expect(await licenseRepository.count()).toBe(1);
		});

		it('rejects a trial for an email that already holds an admin-issued trial license', async () => {
			await seedLicense({ plan: SubscriptionPlan.TRIAL_14, customerEmail: 'jane@example.com', serverLimit: 1 });

			await expect(service.issueTrial({ name: 'Jane Doe', email: 'jane@example.com' })).rejects.toThrow(
				DuplicateTrialException,
			);
		});

		it('rejects a trial when an admin issued a trial license under a differently cased email', async () => {
			await service.issue({ plan: 'trial14', customer_name: 'Jane Doe', customer_email: 'Jane@Example.com' });

			await expect(service.issueTrial({ name: 'Jane Doe', email: 'Jane@Example.com' })).rejects.toThrow(
				DuplicateTrialException,
			);
			expect(await licenseRepository.countBy({ plan: SubscriptionPlan.TRIAL_14 })).toBe(1);
		});

		it('issues exactly one trial when the same email races', async () => {
			const results = await Promise.allSettled(
				Array.from({ length: 5 }, () => service.issueTrial({ name: 'Jane Doe', email: 'jane@example.com' })),
			);

			const fulfilled = results.filter((result) => result.status === 'fulfilled');
			const rejected = results.filter(
				(result): result is PromiseRejectedResult => result.status === 'rejected',
			);
			expect(fulfilled).toHaveLength(1);
			expect(rejected).toHaveLength(4);
			rejected.forEach((result) => expect(result.reason).toBeInstanceOf(DuplicateTrialException));
			expect(await licenseRepository.countBy({ trialEmail: 'jane@example.com' })).toBe(1);
			expect(await contactRepository.count()).toBe(1);
		});

		it('queues the trial email with the install command', async () => {
			const result = await service.issueTrial({ name: 'Jane Doe', email: 'jane@example.com' });

			expect(eventEmitter.emit).toHaveBeenCalledWith(
				SEND_EMAIL_EVENT,
				EmailType.TRIAL_ISSUED,
				['jane@example.com'],
				expect.objectContaining({ installCommand: result.install_command }),
			);
			expect(eventEmitter.emit).toHaveBeenCalledWith(
				SEND_EMAIL_EVENT,
				EmailType.TRIAL_ISSUED_ADMIN,
				['ops@example.com'],
				expect.objectContaining({ customerEmail: 'jane@example.com', company: null }),
			);
		});
	});

	describe('validate', () => {
		it('reports an active, unexpired license as valid', async () => {
			const license = await seedLicense();
			await activationRepository.insert({ licenseKey: license.key, machineId: 'm1', seat: 1, lastSeen: new Date() });

			const result = await service.validate(license.key);

			expect(result).toMatchObject({
				license_key: license.key,
				plan: 'personal',
				plan_name: 'Personal',
				is_active: true,
				is_expired: false,
				is_valid: true,
				activated_count: 1,
			});
		});

		it('is still valid on the last day of validity', async () => {
			const license = await seedLicense({ validUntil: service.today() });

			const result = await service.validate(license.key);

			expect(result.is_expired).toBe(false);
			expect(result.is_valid).toBe(true);
		});

		it('reports an expired license', async () => {
			const license = await seedLicense({ validUntil: LicenseDateUtil.addDays(service.today(), -1) });

			const result = await service.validate(license.key);

			expect(result.is_expired).toBe(true);
			expect(result.is_valid).toBe(false);
		});

		it('reports a revoked license as invalid', async () => {
			const license = await seedLicense({ isActive: false });

			const result = await service.validate(license.key);

			expect(result.is_expired).toBe(false);
			expect(result.is_valid).toBe(false);
		});

		it('returns identical results when nothing changed in between', async () => {
			const license = await seedLicense();

			expect(await service.validate(license.key)).toEqual(await service.validate(license.key));
		});

		it('throws NotFound for an unknown key', async () => {
			await expect(service.validate('NOVE-XXX-0000-0000-0000')).rejects.toThrow(NotFoundException);
		});
	});

	describe('revoke', () => {
		it('deactivates the license and is idempotent', async () => {
			const license = await seedLicense();

			expect(await service.revoke(license.key)).toEqual({
				status: 'ok',
				message: `${license.key} has been revoked`,
			});
			expect(await service.revoke(license.key)).toEqual({
				status: 'ok',
				message: `${license.key} has been revoked`,
			});

			const stored = await licenseRepository.findOneBy({ key: license.key });
			expect(stored?.isActive).toBe(false);
		});

		it('throws NotFound for an unknown key', async () => {
			await expect(service.revoke('NOVE-XXX-0000-0000-0000')).rejects.toThrow(NotFoundException);
		});
	});

	describe('findAll', () => {
		it('lists licenses newest first with their activation counts', async () => {
			await seedLicense({ key: 'NOVE-PER-0000-0000-0001' });
			await seedLicense({ key: 'NOVE-PER-0000-0000-0002' });
			await activationRepository.insert([
				{ licenseKey: 'NOVE-PER-0000-0000-0001', machineId: 'm1', seat: 1, lastSeen: new Date() },
				{ licenseKey: 'NOVE-PER-0000-0000-0001', machineId: 'm2', seat: 2, lastSeen: new Date() },
			]);

			const result = await service.findAll();

			expect(result.map((license) => [license.license_key, license.activated_count])).toEqual([
				['NOVE-PER-0000-0000-0002', 0],
				['NOVE-PER-0000-0000-0001', 2],
			]);
		});
	});
});
