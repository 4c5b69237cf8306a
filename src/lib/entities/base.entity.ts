import { CreateDateColumn, PrimaryGeneratedColumn } from 'typeorm';

export abstract class BaseEntity {
	@PrimaryGeneratedColumn()
	uid!: number;

	@CreateDateColumn({ name: 'created_at' })
	createdAt!: Date;
}
