import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { TypeOrmModule } from '@nestjs/typeorm';
import { LicensingService } from './licensing.service';
import { ActivationService } from './activation.service';
import { LicensingController } from './licensing.controller';
import { TrialController } from './trial.controller';
import { LicensingNotificationsService } from './licensing-notifications.service';
import { License } from './entities/license.entity';
import { Activation } from './entities/activation.entity';
import { Contact } from '../contacts/entities/contact.entity';
import { LicenseExceptionFilter } from './lib/filters/license-exception.filter';

@Module({
	imports: [TypeOrmModule.forFeature([License, Activation, Contact])],
	controllers: [LicensingController, TrialController],
	providers: [
		LicensingService,
		ActivationService,
		LicensingNotificationsService,
		{
			provide: APP_FILTER,
			useClass: LicenseExceptionFilter,
		},
	],
	exports: [LicensingService, ActivationService],
})
export class LicensingModule {}
