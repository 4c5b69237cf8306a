import { ConflictException, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { IsNull, Not, Repository } from 'typeorm';
import { Activation } from './entities/activation.entity';
import { License } from './entities/license.entity';
import { LicensingService } from './licensing.service';
import { ActivateLicenseDto } from './dto/activate-license.dto';
import { ActivationRecord, ActivationResult, StatusMessage, toActivationRecord } from './dto/license-response.dto';
import { LicenseForbiddenException } from './lib/exceptions/license.exceptions';
import { ActivationStatus } from '../lib/enums/license.enums';
import { getPlan } from '../lib/constants/license-plans';
import { LicenseDateUtil } from '../lib/utils/license-date.util';
import { isUniqueViolation } from '../lib/utils/query-error.util';

/**
 * Binds machines to licenses.
 *
 * On a limited license every bound machine holds a seat in 1..serverLimit and
 * (license_key, seat) is unique, so concurrent activations can never exceed the
 * limit: a request that loses the race for a seat re-reads and tries the next free one.
 */
@Injectable()
export class ActivationService {
	private readonly logger = new Logger(ActivationService.name);

	constructor(
		@InjectRepository(Activation)
		private readonly activationRepository: Repository<Activation>,
		private readonly licensingService: LicensingService,
	) {}

	async activate(dto: ActivateLicenseDto): Promise<ActivationResult> {
		const license = await this.licensingService.findByKey(dto.license_key);

		if (!license.isActive) {
			throw LicenseForbiddenException.revoked();
		}
		if (LicenseDateUtil.isExpired(license.validUntil, this.licensingService.today())) {
			throw LicenseForbiddenException.expired(license.validUntil);
		}

		const status = await this.bind(license, dto.machine_id);
		const activatedCount = await this.licensingService.countActivations(license.key);

		return {
			is_valid: true,
			status,
			plan: license.plan,
			plan_name: getPlan(license.plan).displayName,
			customer_name: license.customerName,
			valid_until: license.validUntil,
			server_limit: license.serverLimit,
			activated_count: activatedCount,
		};
	}

	async listActivations(key: string): Promise<ActivationRecord[]> {
		const license = await this.licensingService.findByKey(key);
		const activations = await this.activationRepository.find({
			where: { licenseKey: license.key },
			order: { activatedAt: 'ASC', uid: 'ASC' },
		});
		return activations.map(toActivationRecord);
	}

	async removeActivation(key: string, machineId: string): Promise<StatusMessage> {
		const license = await this.licensingService.findByKey(key);
		const result = await this.activationRepository.delete({ licenseKey: license.key, machineId });

		if (result.affected) {
			this.logger.log(`Removed machine ${machineId} from license ${license.key}`);
		}
		return { status: 'ok', message: `${machineId} is no longer activated on ${license.key}` };
	}

	private async bind(license: License, machineId: string): Promise<ActivationStatus> {
		if (await this.touch(license.key, machineId)) {
			return ActivationStatus.VALID;
		}

		if (license.serverLimit === 0) {
			return this.claimSeat(license, machineId, null);
		}

		// Each lost race means another machine took a seat, so serverLimit + 1 attempts always settle
		for (let attempt = 0; attempt <= license.serverLimit; attempt++) {
			const seat = await this.findFreeSeat(license);
			if (seat === null) {
				if (await this.touch(license.key, machineId)) {
					return ActivationStatus.VALID;
				}
				this.logger.warn(`License ${license.key} is at its limit of ${license.serverLimit}, refused ${machineId}`);
				throw LicenseForbiddenException.limitReached(license.serverLimit);
			}

			const status = await this.claimSeat(license, machineId, seat);
			if (status !== null) {
				return status;
			}
		}

		throw new ConflictException('Too many concurrent activations for this license, please retry');
	}

	/**
	 * Inserts the activation row. Returns null when the seat was taken concurrently,
	 * VALID when the same machine was bound concurrently.
	 */
	private async claimSeat(license: License, machineId: string, seat: number): Promise<ActivationStatus | null>;
	private async claimSeat(license: License, machineId: string, seat: null): Promise<ActivationStatus>;
	private async claimSeat(license: License, machineId: string, seat: number | null): Promise<ActivationStatus | null> {
		try {
			await this.activationRepository.insert({
				licenseKey: license.key,
				machineId,
				seat,
				lastSeen: new Date(),
			});
		} catch (error) {
			if (!isUniqueViolation(error)) {
				throw error;
			}
			if (await this.touch(license.key, machineId)) {
				return ActivationStatus.VALID;
			}
			if (seat === null) {
				throw error;
			}
			return null;
		}

		this.logger.log(`Activated ${machineId} on license ${license.key}${seat === null ? '' : ` (seat ${seat})`}`);
		return ActivationStatus.ACTIVATED;
	}

	/** Refreshes last_seen of an existing binding; false when the machine is not bound. */
	private async touch(licenseKey: string, machineId: string): Promise<boolean> {
		const existing = await this.activationRepository.findOneBy({ licenseKey, machineId });
		if (!existing) {
			return false;
		}
		await this.activationRepository.update({ uid: existing.uid }, { lastSeen: new Date() });
		return true;
	}

	private async findFreeSeat(license: License): Promise<number | null> {
		const taken = await this.activationRepository.find({
			select: { seat: true },
			where: { licenseKey: license.key, seat: Not(IsNull()) },
		});
		const used = new Set(taken.map((activation) => activation.seat));

		for (let seat = 1; seat <= license.serverLimit; seat++) {
			if (!used.has(seat)) {
				return seat;
			}
		}
		return null;
	}
}
