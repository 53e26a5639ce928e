import {
  BadRequestException,
  Injectable,
  InternalServerErrorException,
  Logger,
} from '@nestjs/common';
import { detectFormato, isUploadAceito } from './planilha.util';
import { parseDataset, parseMode, runPipeline, summarizeDataset } from './planilhas.pipeline';
import type { Dataset, Modo, PipelineResult, ProcessedWorkbook, SummaryEntry } from './planilhas.types';

export type ResumoPayload = {
  ok: true;
  mode: Modo;
  resumo: SummaryEntry[];
};

export type InspecaoPayload = {
  status: 'sucesso';
  total_linhas: number;
  colunas: string[];
};

@Injectable()
export class PlanilhasService {
  private readonly logger = new Logger(PlanilhasService.name);

  /* ------------------------------ helpers --------------------------------- */

  private unwrap<T>(result: PipelineResult<T>, op: string): T {
    if (result.ok) return result.value;

    const { error } = result;
    switch (error.kind) {
      case 'INVALID_MODE':
        this.logger.warn(`${op}: modo rejeitado "${error.received}"`);
        throw new BadRequestException({ detail: error.detail });
      case 'MISSING_COLUMN':
        this.logger.warn(`${op}: coluna ausente ${error.column}`);
        throw new BadRequestException({ detail: error.detail });
      case 'PROCESSING': {
        const stack = error.cause instanceof Error ? error.cause.stack : undefined;
        this.logger.error(`${op}: ${error.detail}`, stack);
        throw new InternalServerErrorException({ detail: error.detail });
      }
    }
  }

  private requireFile(file: Express.Multer.File | undefined, op: string): Express.Multer.File {
    if (!file) {
      this.logger.warn(`${op}: requisição sem arquivo`);
      throw new BadRequestException({ detail: 'Nenhum arquivo enviado.' });
    }
    if (!isUploadAceito(file.originalname, file.mimetype)) {
      this.logger.warn(`${op}: tipo não suportado ${file.mimetype || '-'} (${file.originalname || '-'})`);
      throw new BadRequestException({
        detail: `Tipo de arquivo não suportado (${file.mimetype || 'desconhecido'}). Envie um CSV, XLS ou XLSX.`,
      });
    }
    return file;
  }

  private readUpload(file: Express.Multer.File, op: string): Dataset {
    const formato = detectFormato(file.originalname, file.mimetype) ?? 'xlsx';
    return this.unwrap(parseDataset(file.buffer, formato), op);
  }

  /* ------------------------------- main ----------------------------------- */

  /**
   * Filtra a planilha pelo modo, marca contratos duplicados e devolve o
   * .xlsx com as abas "Dados Processados" e "Resumo".
   * O modo é validado antes de o arquivo ser lido.
   */
  processar(file: Express.Multer.File | undefined, mode: unknown): ProcessedWorkbook {
    const modo = this.unwrap(parseMode(mode), 'processar');
    const dataset = this.readUpload(this.requireFile(file, 'processar'), 'processar');
    const out = this.unwrap(runPipeline(dataset, modo), 'processar');

    const { total, unicos, duplicados } = out.summary;
    this.logger.log(
      `processar: modo=${modo} linhas=${dataset.rows.length} filtradas=${total} unicos=${unicos} duplicados=${duplicados}`,
    );
    return out;
  }

  /** Mesmo fluxo de processar(), sem gerar o documento. */
  resumo(file: Express.Multer.File | undefined, mode: unknown): ResumoPayload {
    const modo = this.unwrap(parseMode(mode), 'resumo');
    const dataset = this.readUpload(this.requireFile(file, 'resumo'), 'resumo');
    const { summary } = this.unwrap(summarizeDataset(dataset, modo), 'resumo');

    this.logger.log(`resumo: modo=${modo} linhas=${dataset.rows.length} filtradas=${summary.total}`);
    return { ok: true, mode: modo, resumo: summary.entries };
  }

  /** Contagem de linhas e cabeçalho da primeira aba, sem filtro nenhum. */
  inspecionar(file: Express.Multer.File | undefined): InspecaoPayload {
    if (!file) {
      throw new BadRequestException({ status: 'erro', mensagem: 'Nenhum arquivo enviado.' });
    }

    const formato = detectFormato(file.originalname, file.mimetype) ?? 'xlsx';
    const parsed = parseDataset(file.buffer, formato);
    if (!parsed.ok) {
      this.logger.warn(`inspecionar: ${parsed.error.detail}`);
      throw new BadRequestException({ status: 'erro', mensagem: parsed.error.detail });
    }

    return {
      status: 'sucesso',
      total_linhas: parsed.value.rows.length,
      colunas: parsed.value.columns,
    };
  }
}
