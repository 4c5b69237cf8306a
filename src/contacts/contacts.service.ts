import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Contact } from './entities/contact.entity';
import { CreateContactDto } from './dto/create-contact.dto';
import { ContactRecord, toContactRecord } from './dto/contact-response.dto';
import { EmailType } from '../lib/enums/email.enums';
import { EmailField } from '../lib/types/email-templates.types';
import { emitEmail } from '../lib/utils/email-events.util';
import { DEFAULT_LICENSE_TIMEZONE } from '../lib/utils/license-date.util';
import { formatInTimeZone } from 'date-fns-tz';

const blankToNull = (value: string | undefined): string | null => (value && value.trim() ? value.trim() : null);

@Injectable()
export class ContactsService {
	private readonly logger = new Logger(ContactsService.name);

	constructor(
		@InjectRepository(Contact)
		private readonly contactRepository: Repository<Contact>,
		private readonly eventEmitter: EventEmitter2,
		private readonly configService: ConfigService,
	) {}

	async submit(dto: CreateContactDto): Promise<{ status: 'ok'; message: string }> {
		const contact = this.contactRepository.create({
			userType: dto.user_type,
			name: dto.name,
			email: dto.email,
			company: blankToNull(dto.company) ?? blankToNull(dto.business_name),
			position: blankToNull(dto.position),
			industry: blankToNull(dto.industry),
			plan: blankToNull(dto.plan),
			servers: dto.servers ?? null,
			timeline: blankToNull(dto.timeline),
			purpose: blankToNull(dto.purpose),
			message: dto.message,
		});
		await this.contactRepository.insert(contact);

		this.logger.log(`Recorded ${contact.userType} enquiry from ${contact.email}`);
		this.notify(contact);

		return { status: 'ok', message: 'Your enquiry has been sent' };
	}

	async findAll(): Promise<ContactRecord[]> {
		const contacts = await this.contactRepository.find({ order: { createdAt: 'DESC', uid: 'DESC' } });
		return contacts.map(toContactRecord);
	}

	private notify(contact: Contact): void {
		const notifyTo = this.configService.get<string>('NOTIFY_TO');
		if (notifyTo) {
			const timeZone = this.configService.get<string>('LICENSE_TIMEZONE') || DEFAULT_LICENSE_TIMEZONE;
			emitEmail(this.eventEmitter, EmailType.CONTACT_RECEIVED_ADMIN, [notifyTo], {
				name: contact.name,
				email: contact.email,
				userType: contact.userType,
				fields: this.formFields(contact),
				submittedAt: formatInTimeZone(new Date(), timeZone, 'yyyy-MM-dd HH:mm'),
			});
		} else {
			this.logger.warn('NOTIFY_TO is not configured, skipping enquiry notice');
		}

		emitEmail(this.eventEmitter, EmailType.CONTACT_AUTO_REPLY, [contact.email], {
			name: contact.name,
			message: contact.message,
		});
	}

	private formFields(contact: Contact): EmailField[] {
		const fields: [string, string | number | null][] = [
			['Type', contact.userType],
			['Name', contact.name],
			['Email', contact.email],
			['Company', contact.company],
			['Position', contact.position],
			['Industry', contact.industry],
			['Plan', contact.plan],
			['Servers', contact.servers],
			['Timeline', contact.timeline],
			['Purpose', contact.purpose],
			['Message', contact.message],
		];
		return fields.map(([label, value]) => ({ label, value: value === null ? '-' : String(value) }));
	}
}
