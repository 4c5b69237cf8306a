import { Entity, Column, Index } from 'typeorm';
import { BaseEntity } from '../../lib/entities/base.entity';
import { SubscriptionPlan } from '../../lib/enums/license.enums';

@Entity('licenses')
export class License extends BaseEntity {
	@Index({ unique: true })
	@Column({ name: 'license_key', type: 'varchar', length: 64 })
	key!: string;

	@Column({ type: 'varchar', length: 32 })
	plan!: SubscriptionPlan;

	@Column({ name: 'customer_name', type: 'varchar', length: 255 })
	customerName!: string;

	@Column({ name: 'customer_email', type: 'varchar', length: 255 })
	customerEmail!: string;

	/** 0 means unlimited. */
	@Column({ name: 'server_limit', type: 'int' })
	serverLimit!: number;

	@Column({ name: 'valid_from', type: 'date' })
	validFrom!: string;

	@Column({ name: 'valid_until', type: 'date' })
	validUntil!: string;

	@Column({ name: 'is_active', type: 'boolean', default: true })
	isActive!: boolean;

	@Column({ type: 'text', nullable: true })
	note!: string | null;

	// Set only on self-service trials; the unique index keeps one trial per address.
	@Index({ unique: true })
	@Column({ name: 'trial_email', type: 'varchar', length: 255, nullable: true })
	trialEmail!: string | null;
}
