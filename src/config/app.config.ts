import { registerAs } from '@nestjs/config';

export interface AppConfig {
  port: number;
  corsOrigin: string;
  bodyLimit: string;
}

export default registerAs('app', (): AppConfig => ({
  port: parseInt(process.env.PORT || '8000', 10),
  corsOrigin: process.env.CORS_ORIGIN || '*',
  // base64 payloads are returned, not accepted, so requests stay small
  bodyLimit: process.env.BODY_LIMIT || '1mb',
}));
