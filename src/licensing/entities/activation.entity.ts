import { Entity, Column, PrimaryGeneratedColumn, CreateDateColumn, ManyToOne, JoinColumn, Index } from 'typeorm';
import { License } from './license.entity';

@Entity('activations')
@Index(['licenseKey', 'machineId'], { unique: true })
@Index(['licenseKey', 'seat'], { unique: true })
export class Activation {
	@PrimaryGeneratedColumn()
	uid!: number;

	@Column({ name: 'license_key', type: 'varchar', length: 64 })
	licenseKey!: string;

	@ManyToOne(() => License, { onDelete: 'CASCADE' })
	@JoinColumn({ name: 'license_key', referencedColumnName: 'key' })
	license?: License;

	@Column({ name: 'machine_id', type: 'varchar', length: 255 })
	machineId!: string;

	/**
	 * Seat number in 1..serverLimit occupied by this machine, or null on an
	 * unlimited license. Unique per license, so a full license cannot admit another row.
	 */
	@Column({ type: 'int', nullable: true })
	seat!: number | null;

	@CreateDateColumn({ name: 'activated_at' })
	activatedAt!: Date;

	@Column({ name: 'last_seen', type: 'datetime' })
	lastSeen!: Date;
}
