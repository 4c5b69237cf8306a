import { EmailType } from '../enums/email.enums';

export interface BaseEmailData {
	name: string;
}

export interface EmailField {
	label: string;
	value: string;
}

export interface ContactReceivedAdminData extends BaseEmailData {
	userType: string;
	email: string;
	/** Every submitted form field in display order, blanks rendered as "-". */
	fields: EmailField[];
	submittedAt: string;
}

export interface ContactAutoReplyData extends BaseEmailData {
	message: string;
}

export interface LicenseDetailsData extends BaseEmailData {
	licenseKey: string;
	planName: string;
	priceLabel: string;
	serverLimitLabel: string;
	validFrom: string;
	validUntil: string;
}

export type LicenseIssuedData = LicenseDetailsData;

export interface LicenseIssuedAdminData extends LicenseDetailsData {
	customerEmail: string;
	note: string | null;
}

export interface TrialIssuedData extends LicenseDetailsData {
	installCommand: string;
}

export interface TrialIssuedAdminData extends LicenseDetailsData {
	customerEmail: string;
	company: string | null;
}

export interface LicenseExpiringData extends BaseEmailData {
	licenseKey: string;
	planName: string;
	validUntil: string;
	daysRemaining: number;
}

export interface EmailDataMap {
	[EmailType.CONTACT_RECEIVED_ADMIN]: ContactReceivedAdminData;
	[EmailType.CONTACT_AUTO_REPLY]: ContactAutoReplyData;
	[EmailType.LICENSE_ISSUED]: LicenseIssuedData;
	[EmailType.LICENSE_ISSUED_ADMIN]: LicenseIssuedAdminData;
	[EmailType.LICENSE_EXPIRING]: LicenseExpiringData;
	[EmailType.TRIAL_ISSUED]: TrialIssuedData;
	[EmailType.TRIAL_ISSUED_ADMIN]: TrialIssuedAdminData;
}

export interface EmailTemplate {
	subject: string;
	body: string;
}
