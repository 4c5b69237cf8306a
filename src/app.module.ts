import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { ScheduleModule } from '@nestjs/schedule';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { createTypeOrmOptions } from './config/database.config';
import { CommunicationModule } from './communication/communication.module';
import { ContactsModule } from './contacts/contacts.module';
import { LicensingModule } from './licensing/licensing.module';

@Module({
	imports: [
		ConfigModule.forRoot({
			isGlobal: true,
		}),
		EventEmitterModule.forRoot(),
		ScheduleModule.forRoot(),
		TypeOrmModule.forRootAsync({
			imports: [ConfigModule],
			useFactory: createTypeOrmOptions,
			inject: [ConfigService],
		}),
		CommunicationModule,
		ContactsModule,
		LicensingModule,
	],
	controllers: [AppController],
	providers: [AppService],
})
export class AppModule {}
