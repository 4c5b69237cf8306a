import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { getRepositoryToken } from '@nestjs/typeorm';
import { CommunicationService } from './communication.service';
import { CommunicationLog } from './entities/communication-log.entity';
import { EMAIL_NOTIFIERS, Notifier } from './notifiers/notifier.interface';
import { EmailTemplateService } from '../lib/services/email-template.service';
import { EmailChannel, EmailType } from '../lib/enums/email.enums';
import { RepositoryMock, repositoryMockFactory } from '../../test/utils/mock-factory';
import { testingConfigService } from '../../test/utils/testing-database';

type FakeNotifier = Notifier & { send: jest.Mock };

const fakeNotifier = (channel: EmailChannel, configured = true): FakeNotifier => ({
	channel,
	isConfigured: () => configured,
	send: jest.fn().mockResolvedValue(undefined),
});

describe('CommunicationService', () => {
	let service: CommunicationService;
	let repositoryMock: RepositoryMock;
	let resend: FakeNotifier;
	let smtp: FakeNotifier;

	const compile = async (notifiers: Notifier[]) => {
		const module: TestingModule = await Test.createTestingModule({
			providers: [
				CommunicationService,
				EmailTemplateService,
				{ provide: getRepositoryToken(CommunicationLog), useFactory: repositoryMockFactory },
				{ provide: EMAIL_NOTIFIERS, useValue: notifiers },
				{ provide: ConfigService, useValue: testingConfigService() },
			],
		}).compile();

		service = module.get(CommunicationService);
		repositoryMock = module.get(getRepositoryToken(CommunicationLog));
	};

	const sendAutoReply = (recipients: string[] = ['jane@example.com']) =>
		service.sendEmail(EmailType.CONTACT_AUTO_REPLY, recipients, { name: 'Jane Doe', message: 'Hello there' });

	beforeEach(async () => {
		resend = fakeNotifier(EmailChannel.RESEND);
		smtp = fakeNotifier(EmailChannel.SMTP);
		await compile([resend, smtp]);
	});

	it('delivers through the primary channel', async () => {
		const result = await sendAutoReply();

		expect(result).toEqual({ delivered: true, channel: EmailChannel.RESEND, skipped: false });
		expect(resend.send).toHaveBeenCalledTimes(1);
		expect(resend.send).toHaveBeenCalledWith({
			to: ['jane@example.com'],
			subject: 'Thank you for contacting us - NOVE OS',
			html: expect.stringContaining('Dear Jane Doe,'),
		});
		expect(smtp.send).not.toHaveBeenCalled();
		expect(repositoryMock.insert).toHaveBeenCalledWith({
			emailType: EmailType.CONTACT_AUTO_REPLY,
			recipientEmails: ['jane@example.com'],
			subject: 'Thank you for contacting us - NOVE OS',
			channel: EmailChannel.RESEND,
			delivered: true,
			error: null,
		});
	});

	it('falls back to SMTP when the primary channel fails', async () => {
		resend.send.mockRejectedValue(new Error('Request failed with status code 500'));

		const result = await sendAutoReply();

		expect(result).toEqual({ delivered: true, channel: EmailChannel.SMTP, skipped: false });
		expect(smtp.send).toHaveBeenCalledTimes(1);
		expect(repositoryMock.insert).toHaveBeenCalledWith(
			expect.objectContaining({ channel: EmailChannel.SMTP, delivered: true }),
		);
	});

	it('records the failure without throwing when every channel fails', async () => {
		resend.send.mockRejectedValue(new Error('Request failed with status code 500'));
		smtp.send.mockRejectedValue(new Error('Connection timeout'));

		await expect(sendAutoReply()).resolves.toEqual({ delivered: false, channel: EmailChannel.SMTP, skipped: false });
		expect(repositoryMock.insert).toHaveBeenCalledWith({
			emailType: EmailType.CONTACT_AUTO_REPLY,
			recipientEmails: ['jane@example.com'],
			subject: 'Thank you for contacting us - NOVE OS',
			channel: EmailChannel.SMTP,
			delivered: false,
			error: 'Connection timeout',
		});
	});

	it('skips channels that are not configured', async () => {
		resend = fakeNotifier(EmailChannel.RESEND, false);
		await compile([resend, smtp]);

		const result = await sendAutoReply();

		expect(result.channel).toBe(EmailChannel.SMTP);
		expect(resend.send).not.toHaveBeenCalled();
	});

	it('logs a skipped send when no channel is configured', async () => {
		await compile([fakeNotifier(EmailChannel.RESEND, false), fakeNotifier(EmailChannel.SMTP, false)]);

		const result = await sendAutoReply();

		expect(result).toEqual({ delivered: false, channel: null, skipped: true });
		expect(repositoryMock.insert).toHaveBeenCalledWith(
			expect.objectContaining({ channel: null, delivered: false, error: 'No email channel configured' }),
		);
	});

	it('ignores an email without recipients', async () => {
		const result = await sendAutoReply(['', '  ']);

		expect(result).toEqual({ delivered: false, channel: null, skipped: true });
		expect(resend.send).not.toHaveBeenCalled();
		expect(repositoryMock.insert).not.toHaveBeenCalled();
	});

	it('still reports delivery when the log row cannot be written', async () => {
		repositoryMock.insert.mockRejectedValue(new Error('table is locked'));

		await expect(sendAutoReply()).resolves.toEqual({ delivered: true, channel: EmailChannel.RESEND, skipped: false });
	});
});
