import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { AppConfig } from './config/app.config';
import { LoggingInterceptor } from './libs/interceptor/Logging.interceptor';

async function bootstrap(): Promise<void> {
	const logger = new Logger('Bootstrap');
	const app = await NestFactory.create<NestExpressApplication>(AppModule);

	const config = app.get(ConfigService).getOrThrow<AppConfig>('app');

	app.useBodyParser('json', { limit: config.bodyLimit });
	app.enableCors({ origin: config.corsOrigin });
	app.useGlobalPipes(
		new ValidationPipe({
			transform: true,
			whitelist: true,
		}),
	);
	app.useGlobalInterceptors(new LoggingInterceptor());

	const document = SwaggerModule.createDocument(
		app,
		new DocumentBuilder()
			.setTitle('Ad Creative Renderer')
			.setDescription('Renders social-media ad images with safe-zone aware text and logo placement')
			.setVersion('1.0')
			.build(),
	);
	SwaggerModule.setup('docs', app, document);

	await app.listen(config.port);
	logger.log(`🚀 Server listening on port ${config.port}`);
}

bootstrap().catch((error: unknown) => {
	const stack = error instanceof Error ? error.stack : String(error);
	new Logger('Bootstrap').error('Failed to start', stack);
	process.exit(1);
});
