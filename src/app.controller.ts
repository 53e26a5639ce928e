import { Controller, Get } from '@nestjs/common';
import { AppService, SERVICE_NAME } from './app.service';

@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get()
  root() {
    return {
      ok: true,
      service: SERVICE_NAME,
      version: this.appService.version(),
      message: this.appService.getHello(),
      timestamp: new Date().toISOString(),
    };
  }
}
