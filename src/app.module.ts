// src/app.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import appConfig from './config/app.config';
import renderConfig from './config/render.config';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { CreativeModule } from './modules/creative/creative.module';
import { ConfigurationsModule } from './modules/creative/configurations/configurations.module';

@Module({
	imports: [
		ConfigModule.forRoot({
			isGlobal: true,
			load: [appConfig, renderConfig],
		}),

		CreativeModule,
		ConfigurationsModule, // GET /configs/formats
	],
	controllers: [AppController],
	providers: [AppService],
})
export class AppModule { }
