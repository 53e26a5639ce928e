import * as Papa from 'papaparse';
import * as XLSX from 'xlsx';
import { UPLOAD_EXTENSIONS, UPLOAD_MIME_TYPES } from './planilhas.constants';
import type { CellValue, Dataset, Row } from './planilhas.types';

export type FormatoPlanilha = 'xlsx' | 'csv';

export type SheetSpec = {
  name: string;
  header: string[];
  rows: Row[];
};

/* ------------------------------ detecção --------------------------------- */

/** Extensão primeiro; MIME só decide quando o nome não ajuda. */
export function detectFormato(originalname?: string, mimetype?: string): FormatoPlanilha | null {
  const name = (originalname || '').toLowerCase();
  const mime = (mimetype || '').toLowerCase();

  if (name.endsWith('.csv')) return 'csv';
  if (name.endsWith('.xlsx') || name.endsWith('.xls')) return 'xlsx';

  if (mime.includes('text/csv') || mime.includes('application/csv')) return 'csv';
  if (mime.includes('spreadsheetml') || mime === 'application/vnd.ms-excel') return 'xlsx';
  return null;
}

export function isUploadAceito(originalname?: string, mimetype?: string): boolean {
  const mimeOk = UPLOAD_MIME_TYPES.has((mimetype || '').toLowerCase());
  const name = (originalname || '').toLowerCase();
  const extOk = UPLOAD_EXTENSIONS.some((ext) => name.endsWith(ext));
  return mimeOk || extOk;
}

/* -------------------------------- CSV ------------------------------------ */

function decodeSmart(buf: Buffer): string {
  const utf8 = buf.toString('utf-8');
  const repl = (utf8.match(/\uFFFD/g) || []).length;
  if (repl <= 2) return utf8;
  return buf.toString('latin1');
}

function stripBom(s: string) {
  return s.replace(/^\uFEFF/, '');
}

function detectDelimiter(sampleLine: string): ',' | ';' | '\t' {
  const counts: Array<[',' | ';' | '\t', number]> = [
    [';', (sampleLine.match(/;/g) || []).length],
    [',', (sampleLine.match(/,/g) || []).length],
    ['\t', (sampleLine.match(/\t/g) || []).length],
  ];
  counts.sort((a, b) => b[1] - a[1]);
  return counts[0][1] > 0 ? counts[0][0] : ',';
}

/**
 * Nomes de coluna a partir dos textos do cabeçalho: vazios viram COLUNA_<n>
 * e repetidos ganham o menor sufixo _1, _2… ainda livre.
 */
export function uniqueHeaders(raw: Array<string | null | undefined>): string[] {
  const used = new Set<string>();
  return raw.map((value, i) => {
    const base = value ? value : `COLUNA_${i + 1}`;
    let name = base;
    for (let n = 1; used.has(name); n++) name = `${base}_${n}`;
    used.add(name);
    return name;
  });
}

/** Linha sem protótipo: uma coluna chamada `__proto__` vira chave própria. */
function toRow(columns: string[], values: ReadonlyArray<CellValue | undefined>): Row {
  const row: Row = Object.create(null);
  columns.forEach((col, i) => {
    row[col] = values[i] ?? null;
  });
  return row;
}

function readCsv(buffer: Buffer): Dataset {
  const content = stripBom(decodeSmart(buffer));
  const firstLine = content.split(/\r?\n/).find((l) => l.trim().length > 0) ?? '';
  if (!firstLine) return { columns: [], rows: [] };

  // 'greedy' descarta também linhas só com delimitadores (ex.: ";;")
  const parsed = Papa.parse<string[]>(content, {
    header: false,
    skipEmptyLines: 'greedy',
    delimiter: detectDelimiter(firstLine),
    dynamicTyping: false,
  });

  const [header = [], ...records] = parsed.data;
  const columns = uniqueHeaders(header);
  return { columns, rows: records.map((rec) => toRow(columns, rec.map((v) => (v === '' ? null : v)))) };
}

/* -------------------------------- XLSX ----------------------------------- */

function readHeader(sheet: XLSX.WorkSheet, range: XLSX.Range): string[] {
  const raw: string[] = [];
  for (let c = range.s.c; c <= range.e.c; c++) {
    const cell: XLSX.CellObject | undefined = sheet[XLSX.utils.encode_cell({ r: range.s.r, c })];
    raw.push(cell && cell.v != null ? XLSX.utils.format_cell(cell) : '');
  }
  return uniqueHeaders(raw);
}

export function sheetToDataset(sheet: XLSX.WorkSheet | undefined): Dataset {
  const ref = sheet ? String(sheet['!ref'] || '') : '';
  if (!sheet || !ref) return { columns: [], rows: [] };

  const range = XLSX.utils.decode_range(ref);
  const columns = readHeader(sheet, range);

  // header: 1 devolve arrays; as chaves são montadas aqui, em toRow
  const raw = XLSX.utils.sheet_to_json<Array<CellValue | undefined>>(sheet, {
    header: 1,
    range: range.s.r + 1,
    defval: null,
    raw: true,
    blankrows: false,
  });

  return { columns, rows: raw.map((rec) => toRow(columns, rec)) };
}

/** Lê todas as abas, na ordem do arquivo. */
export function readWorkbook(buffer: Buffer): { sheetNames: string[]; sheets: Record<string, Dataset> } {
  const wb = XLSX.read(buffer, { type: 'buffer', cellDates: true });
  const sheets: Record<string, Dataset> = {};
  for (const name of wb.SheetNames) sheets[name] = sheetToDataset(wb.Sheets[name]);
  return { sheetNames: [...wb.SheetNames], sheets };
}

// ZIP (xlsx) e OLE/CFB (xls legado)
const ASSINATURAS_PLANILHA = [
  Buffer.from([0x50, 0x4b, 0x03, 0x04]),
  Buffer.from([0xd0, 0xcf, 0x11, 0xe0]),
];

export function temAssinaturaPlanilha(buffer: Buffer): boolean {
  return ASSINATURAS_PLANILHA.some((sig) => buffer.length >= sig.length && buffer.subarray(0, sig.length).equals(sig));
}

/**
 * Dataset da primeira aba (ou do CSV). Lança se os bytes não forem
 * uma planilha legível.
 */
export function readDataset(buffer: Buffer, formato: FormatoPlanilha = 'xlsx'): Dataset {
  if (!buffer || !buffer.length) throw new Error('Arquivo vazio.');
  if (formato === 'csv') return readCsv(buffer);

  // sem isso o XLSX.read cai no leitor de texto e aceita qualquer coisa
  if (!temAssinaturaPlanilha(buffer)) throw new Error('Arquivo não é uma planilha válida.');

  const wb = XLSX.read(buffer, { type: 'buffer', cellDates: true });
  const first = wb.SheetNames[0];
  if (!first) throw new Error('Planilha sem abas.');
  return sheetToDataset(wb.Sheets[first]);
}

export function writeWorkbook(sheets: SheetSpec[]): Buffer {
  const wb = XLSX.utils.book_new();
  for (const s of sheets) {
    const ws = XLSX.utils.json_to_sheet(s.rows, { header: s.header });
    XLSX.utils.book_append_sheet(wb, ws, s.name);
  }
  const buf: Buffer = XLSX.write(wb, { type: 'buffer', bookType: 'xlsx' });
  return buf;
}
