import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class ActivateLicenseDto {
	@ApiProperty({
		type: String,
		example: 'NOVE-STA-1A2B-3C4D-5E6F',
	})
	@IsString()
	@IsNotEmpty()
	@MaxLength(64)
	license_key!: string;

	@ApiProperty({
		type: String,
		example: 'srv-01.example.internal',
		description: 'Client supplied identifier of the machine being activated',
	})
	@IsString()
	@IsNotEmpty()
	@MaxLength(255)
	machine_id!: string;
}
