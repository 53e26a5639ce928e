import {
  ABA_PROCESSADOS,
  ABA_RESUMO,
  CABECALHO_RESUMO,
  CODIGO_POR_MODO,
  COLUNA_CONTRATO,
  COLUNA_DUPLICADO,
  COLUNA_STATUS,
  COLUNAS_OBRIGATORIAS,
  METRICA_DUPLICADOS,
  METRICA_TOTAL,
  METRICA_UNICOS,
  MODOS,
  XLSX_CONTENT_TYPE,
  nomeArquivoSaida,
} from './planilhas.constants';
import { FormatoPlanilha, readDataset, writeWorkbook } from './planilha.util';
import type {
  AnnotatedRow,
  CellValue,
  Dataset,
  Modo,
  PipelineError,
  PipelineResult,
  ProcessedWorkbook,
  Row,
  SummaryRecord,
} from './planilhas.types';

const ok = <T>(value: T): PipelineResult<T> => ({ ok: true, value });
const fail = <T>(error: PipelineError): PipelineResult<T> => ({ ok: false, error });

function processingError(err: unknown): PipelineError {
  const msg = err instanceof Error ? err.message : String(err);
  return { kind: 'PROCESSING', detail: `Erro ao processar planilha: ${msg}`, cause: err };
}

/** null/undefined -> '', demais tipos -> representação em texto */
export function cellToText(v: CellValue | undefined): string {
  if (v == null) return '';
  if (v instanceof Date) return v.toISOString();
  return String(v);
}

/* ------------------------------- modo ------------------------------------ */

function isModo(v: string): v is Modo {
  return MODOS.some((m) => m === v);
}

export function parseMode(raw: unknown): PipelineResult<Modo> {
  const received = typeof raw === 'string' ? raw : raw == null ? '' : String(raw);
  if (isModo(received)) return ok(received);
  return fail({
    kind: 'INVALID_MODE',
    received,
    detail: `Modo inválido: '${received}'. Use 'audited' ou 'not-audited'.`,
  });
}

/* ---------------------------- validação ---------------------------------- */

export function validateColumns(dataset: Dataset): PipelineResult<Dataset> {
  for (const column of COLUNAS_OBRIGATORIAS) {
    if (!dataset.columns.includes(column)) {
      return fail({
        kind: 'MISSING_COLUMN',
        column,
        detail: `Coluna '${column}' não encontrada na planilha.`,
      });
    }
  }
  return ok(dataset);
}

/* ------------------------------ filtro ----------------------------------- */

export function normalizeStatus(v: CellValue | undefined): string {
  return cellToText(v).toUpperCase().trim();
}

/**
 * Mantém só as linhas cujo status normalizado bate com o código do modo.
 * A coluna de status sai com o valor normalizado; a ordem é a da origem.
 */
export function filterByMode(rows: Row[], modo: Modo): Row[] {
  const codigo = CODIGO_POR_MODO[modo];
  const out: Row[] = [];
  for (const row of rows) {
    const status = normalizeStatus(row[COLUNA_STATUS]);
    if (status === codigo) out.push({ ...row, [COLUNA_STATUS]: status });
  }
  return out;
}

/* ---------------------------- duplicados --------------------------------- */

// igualdade exata: 1 e '1' são chaves diferentes; vazios formam um grupo só
function keyOf(v: CellValue | undefined): string {
  if (v == null) return 'null:';
  if (v instanceof Date) return `date:${v.getTime()}`;
  return `${typeof v}:${String(v)}`;
}

export function annotateDuplicates(rows: Row[], keyColumn: string = COLUNA_CONTRATO): AnnotatedRow[] {
  const counts = new Map<string, number>();
  for (const row of rows) {
    const k = keyOf(row[keyColumn]);
    counts.set(k, (counts.get(k) ?? 0) + 1);
  }

  return rows.map((row) => ({
    ...row,
    [COLUNA_DUPLICADO]: (counts.get(keyOf(row[keyColumn])) ?? 0) >= 2,
  }));
}

/* ------------------------------ resumo ----------------------------------- */

export function summarize(rows: AnnotatedRow[]): SummaryRecord {
  const total = rows.length;
  const duplicados = rows.filter((r) => r[COLUNA_DUPLICADO]).length;
  const unicos = total - duplicados;
  return {
    total,
    unicos,
    duplicados,
    entries: [
      { metrica: METRICA_TOTAL, valor: total },
      { metrica: METRICA_UNICOS, valor: unicos },
      { metrica: METRICA_DUPLICADOS, valor: duplicados },
    ],
  };
}

/* ----------------------------- montagem ---------------------------------- */

export function processedHeader(columns: string[]): string[] {
  return [...columns.filter((c) => c !== COLUNA_DUPLICADO), COLUNA_DUPLICADO];
}

export function assembleWorkbook(
  columns: string[],
  rows: AnnotatedRow[],
  summary: SummaryRecord,
  modo: Modo,
): PipelineResult<ProcessedWorkbook> {
  const [labelMetrica, labelValor] = CABECALHO_RESUMO;
  try {
    const buffer = writeWorkbook([
      { name: ABA_PROCESSADOS, header: processedHeader(columns), rows },
      {
        name: ABA_RESUMO,
        header: [...CABECALHO_RESUMO],
        rows: summary.entries.map((e) => ({ [labelMetrica]: e.metrica, [labelValor]: e.valor })),
      },
    ]);
    return ok({
      filename: nomeArquivoSaida(modo),
      contentType: XLSX_CONTENT_TYPE,
      buffer,
      summary,
    });
  } catch (err) {
    return fail(processingError(err));
  }
}

/* ------------------------------ pipeline --------------------------------- */

/** validação -> filtro -> duplicados -> resumo */
export function summarizeDataset(
  dataset: Dataset,
  modo: Modo,
): PipelineResult<{ rows: AnnotatedRow[]; summary: SummaryRecord }> {
  const valid = validateColumns(dataset);
  if (!valid.ok) return valid;

  const rows = annotateDuplicates(filterByMode(dataset.rows, modo));
  return ok({ rows, summary: summarize(rows) });
}

export function runPipeline(dataset: Dataset, modo: Modo): PipelineResult<ProcessedWorkbook> {
  const partial = summarizeDataset(dataset, modo);
  if (!partial.ok) return partial;
  return assembleWorkbook(dataset.columns, partial.value.rows, partial.value.summary, modo);
}

export function parseDataset(buffer: Buffer, formato: FormatoPlanilha): PipelineResult<Dataset> {
  try {
    return ok(readDataset(buffer, formato));
  } catch (err) {
    return fail(processingError(err));
  }
}
