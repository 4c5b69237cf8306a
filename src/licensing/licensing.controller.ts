import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, Post, UseGuards } from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { LicensingService } from './licensing.service';
import { ActivationService } from './activation.service';
import { GenerateLicenseDto } from './dto/generate-license.dto';
import { ActivateLicenseDto } from './dto/activate-license.dto';
import {
	ActivationRecord,
	ActivationResult,
	IssuedLicense,
	LicenseRecord,
	LicenseValidation,
	StatusMessage,
} from './dto/license-response.dto';
import { AdminTokenGuard, ADMIN_TOKEN_HEADER } from '../guards/admin-token.guard';

@ApiTags('🔑 Licensing')
@Controller('api')
export class LicensingController {
	constructor(
		private readonly licensingService: LicensingService,
		private readonly activationService: ActivationService,
	) {}

	@Post('license/generate')
	@UseGuards(AdminTokenGuard)
	@ApiHeader({ name: ADMIN_TOKEN_HEADER, required: true })
	@ApiOperation({ summary: 'Issue a license key' })
	@ApiResponse({ status: 201, description: 'License issued and emailed to the customer' })
	@ApiResponse({ status: 400, description: 'Unknown plan or invalid input' })
	@ApiResponse({ status: 401, description: 'Missing or invalid admin token' })
	@ApiResponse({ status: 409, description: 'Key collision, retry' })
	generate(@Body() dto: GenerateLicenseDto): Promise<IssuedLicense> {
		return this.licensingService.issue(dto);
	}

	@Post('license/activate')
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: 'Activate a license on a machine' })
	@ApiResponse({ status: 200, description: 'Machine activated, or already bound' })
	@ApiResponse({ status: 403, description: 'License revoked, expired or at its server limit' })
	@ApiResponse({ status: 404, description: 'License not found' })
	activate(@Body() dto: ActivateLicenseDto): Promise<ActivationResult> {
		return this.activationService.activate(dto);
	}

	@Get('license/validate/:key')
	@ApiOperation({ summary: 'Check whether a license is valid' })
	@ApiResponse({ status: 200, description: 'License record with is_valid and is_expired' })
	@ApiResponse({ status: 404, description: 'License not found' })
	validate(@Param('key') key: string): Promise<LicenseValidation> {
		return this.licensingService.validate(key);
	}

	@Get('licenses')
	@UseGuards(AdminTokenGuard)
	@ApiHeader({ name: ADMIN_TOKEN_HEADER, required: true })
	@ApiOperation({ summary: 'List licenses, newest first' })
	@ApiResponse({ status: 200, description: 'Licenses with their activation counts' })
	@ApiResponse({ status: 401, description: 'Missing or invalid admin token' })
	findAll(): Promise<LicenseRecord[]> {
		return this.licensingService.findAll();
	}

	@Get('license/:key/activations')
	@UseGuards(AdminTokenGuard)
	@ApiHeader({ name: ADMIN_TOKEN_HEADER, required: true })
	@ApiOperation({ summary: 'List machines activated on a license' })
	@ApiResponse({ status: 200, description: 'Activations ordered by activation time' })
	@ApiResponse({ status: 401, description: 'Missing or invalid admin token' })
	@ApiResponse({ status: 404, description: 'License not found' })
	listActivations(@Param('key') key: string): Promise<ActivationRecord[]> {
		return this.activationService.listActivations(key);
	}

	@Delete('license/:key/activations/:machineId')
	@UseGuards(AdminTokenGuard)
	@ApiHeader({ name: ADMIN_TOKEN_HEADER, required: true })
	@ApiOperation({ summary: 'Release a machine from a license' })
	@ApiResponse({ status: 200, description: 'Machine released' })
	@ApiResponse({ status: 401, description: 'Missing or invalid admin token' })
	@ApiResponse({ status: 404, description: 'License not found' })
	removeActivation(@Param('key') key: string, @Param('machineId') machineId: string): Promise<StatusMessage> {
		return this.activationService.removeActivation(key, machineId);
	}

	@Delete('license/:key')
	@UseGuards(AdminTokenGuard)
	@ApiHeader({ name: ADMIN_TOKEN_HEADER, required: true })
	@ApiOperation({ summary: 'Revoke a license' })
	@ApiResponse({ status: 200, description: 'License revoked' })
	@ApiResponse({ status: 401, description: 'Missing or invalid admin token' })
	@ApiResponse({ status: 404, description: 'License not found' })
	revoke(@Param('key') key: string): Promise<StatusMessage> {
		return this.licensingService.revoke(key);
	}
}
