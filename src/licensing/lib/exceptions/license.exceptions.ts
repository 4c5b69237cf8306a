import { ConflictException, ForbiddenException } from '@nestjs/common';
import { LicenseDenialReason } from '../../../lib/enums/license.enums';

export type DenialDetails = Record<string, string | number>;

export class LicenseForbiddenException extends ForbiddenException {
	constructor(
		readonly reason: LicenseDenialReason,
		message: string,
		readonly details: DenialDetails = {},
	) {
		super({ reason, message, ...details });
	}

	static revoked(): LicenseForbiddenException {
		return new LicenseForbiddenException(LicenseDenialReason.REVOKED, 'This license has been revoked');
	}

	static expired(validUntil: string): LicenseForbiddenException {
		return new LicenseForbiddenException(LicenseDenialReason.EXPIRED, `This license expired on ${validUntil}`, {
			valid_until: validUntil,
		});
	}

	static limitReached(serverLimit: number): LicenseForbiddenException {
		return new LicenseForbiddenException(
			LicenseDenialReason.LIMIT_REACHED,
			`Server limit reached: this license allows ${serverLimit} machine(s)`,
			{ server_limit: serverLimit },
		);
	}
}

export class DuplicateTrialException extends ConflictException {
	readonly reason = 'duplicate_trial';

	constructor(email: string) {
		super({ reason: 'duplicate_trial', message: `A trial license has already been issued to ${email}` });
	}
}
