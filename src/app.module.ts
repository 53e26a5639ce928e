import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { AppController } from './app.controller';
import { AppService } from './app.service';
import { HealthModule } from './health/health.module';
import { PlanilhasModule } from './planilhas/planilhas.module';

@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true }), HealthModule, PlanilhasModule],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
