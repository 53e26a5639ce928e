// ---------- colunas obrigatórias ----------
export const COLUNA_STATUS = 'AUDITADO';
export const COLUNA_CONTRATO = 'CONTRATO';
/** checadas nesta ordem: a primeira ausente é a reportada */
export const COLUNAS_OBRIGATORIAS = [COLUNA_STATUS, COLUNA_CONTRATO] as const;

/** coluna derivada, sempre a última da aba processada */
export const COLUNA_DUPLICADO = 'DUPLICADO';

// ---------- modos ----------
export const MODOS = ['audited', 'not-audited'] as const;

/** código do status (já normalizado) que cada modo seleciona */
export const CODIGO_POR_MODO = {
  audited: 'AUDI',
  'not-audited': 'NAUD',
} as const;

// ---------- documento de saída ----------
export const ABA_PROCESSADOS = 'Dados Processados';
export const ABA_RESUMO = 'Resumo';
export const CABECALHO_RESUMO = ['Métrica', 'Valor'] as const;

export const METRICA_TOTAL = 'Total de Linhas';
export const METRICA_UNICOS = 'Contratos Únicos';
export const METRICA_DUPLICADOS = 'Contratos Duplicados';

export const XLSX_CONTENT_TYPE =
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export const nomeArquivoSaida = (modo: string) => `planilha_processada_${modo}.xlsx`;

// ---------- upload ----------
export const UPLOAD_MIME_TYPES = new Set([
  'text/csv',
  'application/csv',
  'application/vnd.ms-excel',
  XLSX_CONTENT_TYPE,
]);
export const UPLOAD_EXTENSIONS = ['.csv', '.xls', '.xlsx'];
