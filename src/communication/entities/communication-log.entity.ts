import { Entity, Column, PrimaryGeneratedColumn, CreateDateColumn } from 'typeorm';
import { EmailChannel, EmailType } from '../../lib/enums/email.enums';

@Entity('communication_logs')
export class CommunicationLog {
	@PrimaryGeneratedColumn()
	uid!: number;

	@Column({ type: 'varchar', length: 64 })
	emailType!: EmailType;

	@Column('simple-array')
	recipientEmails!: string[];

	@Column({ type: 'varchar', length: 255 })
	subject!: string;

	/** Channel that delivered the message, or the last one tried when all failed. */
	@Column({ type: 'varchar', length: 32, nullable: true })
	channel!: EmailChannel | null;

	@Column({ type: 'boolean', default: false })
	delivered!: boolean;

	@Column({ type: 'text', nullable: true })
	error!: string | null;

	@CreateDateColumn()
	createdAt!: Date;
}
