import { Injectable } from '@nestjs/common';

export interface ServiceStatus {
	service: string;
	status: string;
	endpoints: Record<string, string>;
}

@Injectable()
export class AppService {
	getStatus(): ServiceStatus {
		return {
			service: 'Ad Creative Renderer',
			status: 'running',
			endpoints: {
				'POST /generate-ad': 'Render an ad creative',
				'GET /configs/formats': 'List supported formats',
				'GET /health': 'Health check',
				'GET /docs': 'API documentation',
			},
		};
	}

	getHealth(): { status: string } {
		return { status: 'healthy' };
	}
}
