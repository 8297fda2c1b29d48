import { Controller, Get } from '@nestjs/common';
import { AppService, ServiceStatus } from './app.service';

@Controller()
export class AppController {
	constructor(private readonly appService: AppService) { }

	@Get()
	getStatus(): ServiceStatus {
		return this.appService.getStatus();
	}

	@Get('health')
	getHealth(): { status: string } {
		return this.appService.getHealth();
	}
}
