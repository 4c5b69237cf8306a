import { ActivationStatus } from '../../lib/enums/license.enums';
import { getPlan } from '../../lib/constants/license-plans';
import { License } from '../entities/license.entity';
import { Activation } from '../entities/activation.entity';

export interface IssuedLicense {
	status: 'ok';
	license_key: string;
	/** Display name of the plan. */
	plan: string;
	customer_email: string;
	valid_from: string;
	valid_until: string;
	server_limit: number;
}

export interface IssuedTrial extends IssuedLicense {
	install_command: string;
}

export interface LicenseRecord {
	license_key: string;
	plan: string;
	plan_name: string;
	customer_name: string;
	customer_email: string;
	server_limit: number;
	valid_from: string;
	valid_until: string;
	is_active: boolean;
	note: string | null;
	created_at: Date;
	activated_count: number;
}

export interface LicenseValidation extends LicenseRecord {
	is_expired: boolean;
	is_valid: boolean;
}

export interface ActivationResult {
	is_valid: true;
	status: ActivationStatus;
	plan: string;
	plan_name: string;
	customer_name: string;
	valid_until: string;
	server_limit: number;
	activated_count: number;
}

export interface ActivationRecord {
	machine_id: string;
	activated_at: Date;
	last_seen: Date;
}

export interface StatusMessage {
	status: 'ok';
	message: string;
}

export const toIssuedLicense = (license: License): IssuedLicense => ({
	status: 'ok',
	license_key: license.key,
	plan: getPlan(license.plan).displayName,
	customer_email: license.customerEmail,
	valid_from: license.validFrom,
	valid_until: license.validUntil,
	server_limit: license.serverLimit,
});

export const toLicenseRecord = (license: License, activatedCount: number): LicenseRecord => ({
	license_key: license.key,
	plan: license.plan,
	plan_name: getPlan(license.plan).displayName,
	customer_name: license.customerName,
	customer_email: license.customerEmail,
	server_limit: license.serverLimit,
	valid_from: license.validFrom,
	valid_until: license.validUntil,
	is_active: license.isActive,
	note: license.note,
	created_at: license.createdAt,
	activated_count: activatedCount,
});

export const toActivationRecord = (activation: Activation): ActivationRecord => ({
	machine_id: activation.machineId,
	activated_at: activation.activatedAt,
	last_seen: activation.lastSeen,
});
