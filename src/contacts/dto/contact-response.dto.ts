import { Contact } from '../entities/contact.entity';

export interface ContactRecord {
	id: number;
	user_type: string;
	name: string;
	email: string;
	company: string | null;
	position: string | null;
	industry: string | null;
	plan: string | null;
	servers: number | null;
	timeline: string | null;
	purpose: string | null;
	message: string;
	created_at: Date;
}

export const toContactRecord = (contact: Contact): ContactRecord => ({
	id: contact.uid,
	user_type: contact.userType,
	name: contact.name,
	email: contact.email,
	company: contact.company,
	position: contact.position,
	industry: contact.industry,
	plan: contact.plan,
	servers: contact.servers,
	timeline: contact.timeline,
	purpose: contact.purpose,
	message: contact.message,
	created_at: contact.createdAt,
});
