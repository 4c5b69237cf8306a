export enum EmailType {
	// Contact form
	CONTACT_RECEIVED_ADMIN = 'contact_received_admin',
	CONTACT_AUTO_REPLY = 'contact_auto_reply',
	// License related emails
	LICENSE_ISSUED = 'license_issued',
	LICENSE_ISSUED_ADMIN = 'license_issued_admin',
	LICENSE_EXPIRING = 'license_expiring',
	// Trial related emails
	TRIAL_ISSUED = 'trial_issued',
	TRIAL_ISSUED_ADMIN = 'trial_issued_admin',
}

export enum EmailChannel {
	RESEND = 'resend',
	SMTP = 'smtp',
}
