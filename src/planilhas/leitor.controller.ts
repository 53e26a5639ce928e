import { Controller, HttpCode, Post, UploadedFile, UseInterceptors } from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { ApiBody, ApiConsumes, ApiTags } from '@nestjs/swagger';
import { UploadPlanilhaSwagger } from './dto/processar-planilha.dto';
import { InspecaoPayload, PlanilhasService } from './planilhas.service';

/** POST /upload: leitura simples (linhas + colunas) da primeira aba. */
@ApiTags('leitor')
@Controller()
export class LeitorController {
  constructor(private readonly svc: PlanilhasService) {}

  @Post('upload')
  @HttpCode(200)
  @ApiConsumes('multipart/form-data')
  @ApiBody({ type: UploadPlanilhaSwagger })
  @UseInterceptors(FileInterceptor('file'))
  upload(@UploadedFile() file: Express.Multer.File | undefined): InspecaoPayload {
    return this.svc.inspecionar(file);
  }
}
