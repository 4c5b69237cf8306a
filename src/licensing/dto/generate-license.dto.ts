import { ApiProperty } from '@nestjs/swagger';
import { IsEmail, IsInt, IsNotEmpty, IsOptional, IsString, Min } from 'class-validator';
import { Type } from 'class-transformer';

export class GenerateLicenseDto {
	@ApiProperty({
		type: String,
		example: 'startup',
		description: 'Plan identifier from the plan catalog',
	})
	@IsString()
	@IsNotEmpty()
	plan!: string;

	@ApiProperty({
		type: String,
		example: 'Example Corp',
		description: 'Name of the license holder',
	})
	@IsString()
	@IsNotEmpty()
	customer_name!: string;

	@ApiProperty({
		type: String,
		example: 'ops@example.com',
		description: 'Email address the license is sent to',
	})
	@IsEmail()
	customer_email!: string;

	@ApiProperty({
		type: Number,
		example: 12,
		description: 'License length in months of 30 days',
		required: false,
		default: 12,
	})
	@Type(() => Number)
	@IsInt()
	@Min(1)
	@IsOptional()
	months?: number;

	@ApiProperty({
		type: String,
		example: 'Invoice 2024-031',
		required: false,
	})
	@IsString()
	@IsOptional()
	note?: string;
}
