import { MODOS } from './planilhas.constants';

// ---------- dados ----------
export type CellValue = string | number | boolean | Date | null;

/** linha da planilha: nome da coluna -> valor */
export type Row = Record<string, CellValue>;

export type Dataset = {
  /** ordem do cabeçalho da primeira linha */
  columns: string[];
  rows: Row[];
};

export type Modo = (typeof MODOS)[number];

export type AnnotatedRow = Row & { DUPLICADO: boolean };

export type SummaryEntry = { metrica: string; valor: number };

export type SummaryRecord = {
  total: number;
  unicos: number;
  duplicados: number;
  /** mesmos contadores, na ordem da aba "Resumo" */
  entries: SummaryEntry[];
};

export type ProcessedWorkbook = {
  filename: string;
  contentType: string;
  buffer: Buffer;
  summary: SummaryRecord;
};

// ---------- erros ----------
export type PipelineError =
  | { kind: 'INVALID_MODE'; detail: string; received: string }
  | { kind: 'MISSING_COLUMN'; detail: string; column: string }
  | { kind: 'PROCESSING'; detail: string; cause?: unknown };

export type PipelineResult<T> = { ok: true; value: T } | { ok: false; error: PipelineError };
