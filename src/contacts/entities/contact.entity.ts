import { Entity, Column } from 'typeorm';
import { BaseEntity } from '../../lib/entities/base.entity';

@Entity('contacts')
export class Contact extends BaseEntity {
	/** Corporate, sole proprietor, individual, or "trial" for self-service trial signups. */
	@Column({ name: 'user_type', type: 'varchar', length: 64 })
	userType!: string;

	@Column({ type: 'varchar', length: 255 })
	name!: string;

	@Column({ type: 'varchar', length: 255 })
	email!: string;

	@Column({ type: 'varchar', length: 255, nullable: true })
	company!: string | null;

	@Column({ type: 'varchar', length: 255, nullable: true })
	position!: string | null;

	@Column({ type: 'varchar', length: 255, nullable: true })
	industry!: string | null;

	@Column({ type: 'varchar', length: 64, nullable: true })
	plan!: string | null;

	@Column({ type: 'int', nullable: true })
	servers!: number | null;

	@Column({ type: 'varchar', length: 255, nullable: true })
	timeline!: string | null;

	@Column({ type: 'text', nullable: true })
	purpose!: string | null;

	@Column({ type: 'text' })
	message!: string;
}
