import { Body, Controller, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { LicensingService } from './licensing.service';
import { TrialRequestDto } from './dto/trial-request.dto';
import { IssuedTrial } from './dto/license-response.dto';

@ApiTags('🧪 Trials')
@Controller('api/trial')
export class TrialController {
	constructor(private readonly licensingService: LicensingService) {}

	@Post('request')
	@ApiOperation({ summary: 'Request a 14-day trial license' })
	@ApiResponse({ status: 201, description: 'Trial issued; the key and install command are emailed' })
	@ApiResponse({ status: 400, description: 'Invalid input' })
	@ApiResponse({ status: 409, description: 'A trial was already issued to this email' })
	requestTrial(@Body() dto: TrialRequestDto): Promise<IssuedTrial> {
		return this.licensingService.issueTrial(dto);
	}
}
