import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MulterModule } from '@nestjs/platform-express';
import { LeitorController } from './leitor.controller';
import { PlanilhasController } from './planilhas.controller';
import { PlanilhasService } from './planilhas.service';

const DEFAULT_UPLOAD_MAX_MB = 50;

@Module({
  imports: [
    // sem "dest": multer guarda o upload em memória (file.buffer)
    MulterModule.registerAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => {
        const mb = Number(config.get<string>('UPLOAD_MAX_MB') ?? DEFAULT_UPLOAD_MAX_MB);
        const maxMb = Number.isFinite(mb) && mb > 0 ? mb : DEFAULT_UPLOAD_MAX_MB;
        return { limits: { fileSize: maxMb * 1024 * 1024, files: 1 } };
      },
    }),
  ],
  controllers: [PlanilhasController, LeitorController],
  providers: [PlanilhasService],
  exports: [PlanilhasService],
})
export class PlanilhasModule {}
