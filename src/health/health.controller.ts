import { Controller, Get } from '@nestjs/common';
import { AppService, SERVICE_NAME } from '../app.service';

@Controller('health')
export class HealthController {
  constructor(private readonly app: AppService) {}

  @Get()
  status() {
    return {
      ok: true,
      service: SERVICE_NAME,
      status: 'up',
      env: this.app.env(),
      version: this.app.version(),
      uptimeSeconds: Math.round(process.uptime()),
      timestamp: new Date().toISOString(),
    };
  }
}
