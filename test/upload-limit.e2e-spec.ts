import { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { AppModule } from '../src/app.module';
import { configureApp } from '../src/app.setup';
import { PLANILHA_CONTRATOS, xlsxBuffer } from './helpers/planilha';

// ~1 KB: qualquer .xlsx gerado passa disso
const LIMITE_MB = '0.001';

describe('Limite de upload (e2e)', () => {
  let app: INestApplication;
  const anterior = process.env.UPLOAD_MAX_MB;

  beforeAll(async () => {
    process.env.UPLOAD_MAX_MB = LIMITE_MB;
    const moduleRef = await Test.createTestingModule({ imports: [AppModule] }).compile();
    app = moduleRef.createNestApplication({ logger: false });
    configureApp(app, 'api');
    await app.init();
  });

  afterAll(async () => {
    await app.close();
    if (anterior === undefined) delete process.env.UPLOAD_MAX_MB;
    else process.env.UPLOAD_MAX_MB = anterior;
  });

  it('413 com detail quando o arquivo passa de UPLOAD_MAX_MB', async () => {
    const arquivo = xlsxBuffer({ Contratos: PLANILHA_CONTRATOS });
    expect(arquivo.length).toBeGreaterThan(1024 * 1024 * Number(LIMITE_MB));

    const res = await request(app.getHttpServer())
      .post('/api/planilhas/processar')
      .field('mode', 'audited')
      .attach('file', arquivo, 'contratos.xlsx')
      .expect(413);

    expect(res.body).toEqual({ detail: 'File too large' });
  });

  it('arquivo dentro do limite segue para a leitura', async () => {
    const res = await request(app.getHttpServer())
      .post('/api/upload')
      .attach('file', Buffer.from('CONTRATO;AUDITADO\nC1;AUDI\n'), 'pequeno.csv')
      .expect(200);

    expect(res.body).toEqual({ status: 'sucesso', total_linhas: 1, colunas: ['CONTRATO', 'AUDITADO'] });
  });
});
