export enum SubscriptionPlan {
	PERSONAL = 'personal',
	ACADEMIC = 'academic',
	STARTUP = 'startup',
	STANDARD = 'standard',
	ENTERPRISE = 'enterprise',
	BETA = 'beta',
	TRIAL_14 = 'trial14',
	TRIAL = 'trial',
	CONSULTATION = 'consultation',
	OTHER = 'other',
}

/** Transition label returned by an activation call. */
export enum ActivationStatus {
	ACTIVATED = 'activated',
	VALID = 'valid',
}

export enum LicenseDenialReason {
	REVOKED = 'revoked',
	EXPIRED = 'expired',
	LIMIT_REACHED = 'limit_reached',
}
