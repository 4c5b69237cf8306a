import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import helmet from 'helmet';
import compression from 'compression';
import { AppModule } from './app.module';
import { buildCorsOrigins } from './config/cors.config';
import { ADMIN_TOKEN_HEADER } from './guards/admin-token.guard';

async function bootstrap() {
	const app = await NestFactory.create(AppModule);

	app.use(helmet());

	app.use(compression());

	app.enableCors({
		origin: buildCorsOrigins(process.env.ALLOWED_ORIGINS),
		methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
		allowedHeaders: ['Content-Type', ADMIN_TOKEN_HEADER],
		maxAge: 3600,
	});

	app.useGlobalPipes(
		new ValidationPipe({
			whitelist: true,
			transform: true,
		}),
	);

	const config = new DocumentBuilder()
		.setTitle(`${process.env.PRODUCT_NAME || 'NOVE OS'} API`)
		.setDescription(
			'Contact form intake and license registry: issue keys, self-service 14-day trials, validation and per-machine activation limits.',
		)
		.setVersion('1.0.0')
		.addApiKey({ type: 'apiKey', name: ADMIN_TOKEN_HEADER, in: 'header' }, ADMIN_TOKEN_HEADER)
		.addTag('📬 Contacts', 'Contact form submissions')
		.addTag('🔑 Licensing', 'License issuance, validation, activation and revocation')
		.addTag('🧪 Trials', 'Self-service 14-day trial licenses')
		.addTag('🔧 System Health', 'Service and database health checks')
		.build();

	const document = SwaggerModule.createDocument(app, config);
	SwaggerModule.setup('docs', app, document, {
		swaggerOptions: {
			persistAuthorization: true,
			tagsSorter: 'alpha',
			docExpansion: 'none',
			filter: true,
			displayRequestDuration: true,
		},
		customSiteTitle: 'License Registry API Documentation',
		customCss: `
			.swagger-ui .topbar { display: none; }
			.swagger-ui .info { margin: 20px 0; }
		`,
	});

	const port = process.env.PORT ?? 8000;
	await app.listen(port);
	Logger.log(`License registry listening on port ${port}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
	Logger.error('Failed to start the application', error instanceof Error ? error.stack : String(error), 'Bootstrap');
	process.exit(1);
});
