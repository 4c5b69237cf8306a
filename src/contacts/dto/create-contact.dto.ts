import { ApiProperty } from '@nestjs/swagger';
import { IsEmail, IsInt, IsNotEmpty, IsOptional, IsString, Min } from 'class-validator';
import { Type } from 'class-transformer';

export class CreateContactDto {
	@ApiProperty({
		type: String,
		example: 'corporate',
		description: 'Kind of enquirer, e.g. corporate, sole proprietor or individual',
	})
	@IsString()
	@IsNotEmpty()
	user_type!: string;

	@ApiProperty({ type: String, example: 'Jane Doe' })
	@IsString()
	@IsNotEmpty()
	name!: string;

	@ApiProperty({ type: String, example: 'jane@example.com' })
	@IsEmail()
	email!: string;

	@ApiProperty({ type: String, example: 'Example Corp', required: false })
	@IsString()
	@IsOptional()
	company?: string;

	@ApiProperty({ type: String, required: false })
	@IsString()
	@IsOptional()
	position?: string;

	@ApiProperty({
		type: String,
		required: false,
		description: 'Trading name of a sole proprietor, used when company is empty',
	})
	@IsString()
	@IsOptional()
	business_name?: string;

	@ApiProperty({ type: String, required: false })
	@IsString()
	@IsOptional()
	industry?: string;

	@ApiProperty({ type: String, example: 'startup', required: false })
	@IsString()
	@IsOptional()
	plan?: string;

	@ApiProperty({ type: Number, example: 20, required: false })
	@Type(() => Number)
	@IsInt()
	@Min(0)
	@IsOptional()
	servers?: number;

	@ApiProperty({ type: String, example: 'Within 3 months', required: false })
	@IsString()
	@IsOptional()
	timeline?: string;

	@ApiProperty({ type: String, required: false })
	@IsString()
	@IsOptional()
	purpose?: string;

	@ApiProperty({ type: String, example: 'We would like a demo for our team.' })
	@IsString()
	@IsNotEmpty()
	message!: string;
}
