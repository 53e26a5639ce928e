import { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { AppModule } from '../src/app.module';
import { configureApp } from '../src/app.setup';
import { readWorkbook } from '../src/planilhas/planilha.util';
import { PLANILHA_CONTRATOS, xlsxBuffer } from './helpers/planilha';

const XLSX_MIME = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

describe('Planilhas (e2e)', () => {
  let app: INestApplication;
  const entrada = () => xlsxBuffer({ Contratos: PLANILHA_CONTRATOS });

  beforeAll(async () => {
    const moduleRef = await Test.createTestingModule({ imports: [AppModule] }).compile();
    app = moduleRef.createNestApplication({ logger: false });
    configureApp(app, 'api');
    await app.init();
  });

  afterAll(async () => {
    await app.close();
  });

  it('GET /api responde com a mensagem do serviço', async () => {
    const res = await request(app.getHttpServer()).get('/api').expect(200);
    expect(res.body.ok).toBe(true);
    expect(res.body.message).toBe('API do Leitor de Arquivos rodando!');
  });

  it('GET /api/health', async () => {
    const res = await request(app.getHttpServer()).get('/api/health').expect(200);
    expect(res.body.status).toBe('up');
  });

  describe('POST /api/planilhas/processar', () => {
    it('devolve o xlsx processado como anexo', async () => {
      const res = await request(app.getHttpServer())
        .post('/api/planilhas/processar')
        .field('mode', 'audited')
        .attach('file', entrada(), 'contratos.xlsx')
        .responseType('blob')
        .expect(200);

      expect(res.headers['content-type']).toBe(XLSX_MIME);
      expect(res.headers['content-disposition']).toBe(
        'attachment; filename="planilha_processada_audited.xlsx"',
      );
      expect(res.headers['cache-control']).toBe('no-store');

      const body: Buffer = res.body;
      const out = readWorkbook(body);
      expect(out.sheetNames).toEqual(['Dados Processados', 'Resumo']);
      expect(out.sheets['Dados Processados'].rows.map((r) => [r.CONTRATO, r.DUPLICADO])).toEqual([
        ['C1', true],
        ['C1', true],
        ['C2', false],
      ]);
      expect(out.sheets['Resumo'].rows.map((r) => r.Valor)).toEqual([3, 1, 2]);
    });

    it('aceita o modo pela query', async () => {
      const res = await request(app.getHttpServer())
        .post('/api/planilhas/processar?mode=not-audited')
        .attach('file', entrada(), 'contratos.xlsx')
        .responseType('blob')
        .expect(200);

      expect(res.headers['content-disposition']).toBe(
        'attachment; filename="planilha_processada_not-audited.xlsx"',
      );
      const body: Buffer = res.body;
      expect(readWorkbook(body).sheets['Dados Processados'].rows).toEqual([
        { CONTRATO: 'C3', AUDITADO: 'NAUD', VALOR: 400, DUPLICADO: false },
      ]);
    });

    it('400 para modo inválido', async () => {
      const res = await request(app.getHttpServer())
        .post('/api/planilhas/processar')
        .field('mode', 'invalid')
        .attach('file', entrada(), 'contratos.xlsx')
        .expect(400);

      expect(res.body).toEqual({ detail: "Modo inválido: 'invalid'. Use 'audited' ou 'not-audited'." });
    });

    it('400 para coluna ausente', async () => {
      const res = await request(app.getHttpServer())
        .post('/api/planilhas/processar')
        .field('mode', 'audited')
        .attach('file', xlsxBuffer({ P: [['AUDITADO'], ['AUDI']] }), 'sem-contrato.xlsx')
        .expect(400);

      expect(res.body).toEqual({ detail: "Coluna 'CONTRATO' não encontrada na planilha." });
    });

    it('400 sem arquivo', async () => {
      const res = await request(app.getHttpServer())
        .post('/api/planilhas/processar')
        .field('mode', 'audited')
        .expect(400);

      expect(res.body).toEqual({ detail: 'Nenhum arquivo enviado.' });
    });

    it('400 para tipo de arquivo não suportado', async () => {
      const res = await request(app.getHttpServer())
        .post('/api/planilhas/processar')
        .field('mode', 'audited')
        .attach('file', Buffer.from('oi'), { filename: 'notas.txt', contentType: 'text/plain' })
        .expect(400);

      expect(res.body).toEqual({
        detail: 'Tipo de arquivo não suportado (text/plain). Envie um CSV, XLS ou XLSX.',
      });
    });

    it('500 para bytes que não são planilha enviados como .xlsx', async () => {
      const res = await request(app.getHttpServer())
        .post('/api/planilhas/processar')
        .field('mode', 'audited')
        .attach('file', Buffer.from('CONTRATO;AUDITADO\nC1;AUDI\n'), 'x.xlsx')
        .expect(500);

      expect(res.body).toEqual({ detail: 'Erro ao processar planilha: Arquivo não é uma planilha válida.' });
    });

    it('400 para campo desconhecido no formulário', async () => {
      const res = await request(app.getHttpServer())
        .post('/api/planilhas/processar')
        .field('mode', 'audited')
        .field('banco', 'bemge')
        .attach('file', entrada(), 'contratos.xlsx')
        .expect(400);

      expect(res.body).toEqual({ detail: 'property banco should not exist' });
    });
  });

  it('POST /api/planilhas/resumo devolve as métricas em JSON', async () => {
    const res = await request(app.getHttpServer())
      .post('/api/planilhas/resumo')
      .field('mode', 'audited')
      .attach('file', entrada(), 'contratos.xlsx')
      .expect(200);

    expect(res.body).toEqual({
      ok: true,
      mode: 'audited',
      resumo: [
        { metrica: 'Total de Linhas', valor: 3 },
        { metrica: 'Contratos Únicos', valor: 1 },
        { metrica: 'Contratos Duplicados', valor: 2 },
      ],
    });
  });

  it('POST /api/upload conta linhas e colunas', async () => {
    const res = await request(app.getHttpServer())
      .post('/api/upload')
      .attach('file', entrada(), 'contratos.xlsx')
      .expect(200);

    expect(res.body).toEqual({
      status: 'sucesso',
      total_linhas: 5,
      colunas: ['CONTRATO', 'AUDITADO', 'VALOR'],
    });
  });

  it('POST /api/upload recusa bytes que não são planilha', async () => {
    const res = await request(app.getHttpServer())
      .post('/api/upload')
      .attach('file', Buffer.from('%PDF-1.4 relatório'), 'x.xlsx')
      .expect(400);

    expect(res.body).toEqual({
      status: 'erro',
      mensagem: 'Erro ao processar planilha: Arquivo não é uma planilha válida.',
    });
  });

  it('rotas inexistentes também respondem com detail', async () => {
    const res = await request(app.getHttpServer()).get('/api/nao-existe').expect(404);
    expect(res.body).toEqual({ detail: 'Cannot GET /api/nao-existe' });
  });
});
