import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsOptional, IsString } from 'class-validator';
import { MODOS } from '../planilhas.constants';

/** Campos de texto do multipart; o arquivo chega por @UploadedFile. */
export class ProcessarPlanilhaDTO {
  @ApiPropertyOptional({ enum: MODOS, description: 'Partição pelo status da coluna AUDITADO' })
  @IsOptional()
  @IsString()
  mode?: string;
}

/** Só para o Swagger descrever o multipart. */
export class UploadPlanilhaSwagger extends ProcessarPlanilhaDTO {
  @ApiProperty({ type: 'string', format: 'binary' })
  file!: unknown;
}
