import { ApiProperty } from '@nestjs/swagger';
import { IsEmail, IsNotEmpty, IsOptional, IsString } from 'class-validator';

export class TrialRequestDto {
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
}
