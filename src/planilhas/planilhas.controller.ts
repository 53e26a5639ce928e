import {
  Body,
  Controller,
  Header,
  HttpCode,
  Post,
  Query,
  StreamableFile,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { ApiBody, ApiConsumes, ApiTags } from '@nestjs/swagger';
import { ProcessarPlanilhaDTO, UploadPlanilhaSwagger } from './dto/processar-planilha.dto';
import { PlanilhasService, ResumoPayload } from './planilhas.service';

@ApiTags('planilhas')
@Controller('planilhas')
export class PlanilhasController {
  constructor(private readonly svc: PlanilhasService) {}

  // modo pode vir no multipart (campo "mode") ou na query (?mode=)
  @Post('processar')
  @HttpCode(200)
  @Header('Cache-Control', 'no-store')
  @ApiConsumes('multipart/form-data')
  @ApiBody({ type: UploadPlanilhaSwagger })
  @UseInterceptors(FileInterceptor('file'))
  processar(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body() dto: ProcessarPlanilhaDTO,
    @Query('mode') modeQuery?: string,
  ): StreamableFile {
    const out = this.svc.processar(file, dto.mode ?? modeQuery);

    return new StreamableFile(out.buffer, {
      type: out.contentType,
      disposition: `attachment; filename="${out.filename}"`,
      length: out.buffer.length,
    });
  }

  @Post('resumo')
  @HttpCode(200)
  @Header('Cache-Control', 'no-store')
  @ApiConsumes('multipart/form-data')
  @ApiBody({ type: UploadPlanilhaSwagger })
  @UseInterceptors(FileInterceptor('file'))
  resumo(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body() dto: ProcessarPlanilhaDTO,
    @Query('mode') modeQuery?: string,
  ): ResumoPayload {
    return this.svc.resumo(file, dto.mode ?? modeQuery);
  }
}
