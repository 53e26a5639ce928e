import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export const SERVICE_NAME = 'leitor-planilhas-api';

@Injectable()
export class AppService {
  constructor(private readonly config: ConfigService) {}

  getHello(): string {
    return 'API do Leitor de Arquivos rodando!';
  }

  version(): string {
    return this.config.get<string>('npm_package_version') ?? '0.0.0';
  }

  env(): string {
    return this.config.get<string>('NODE_ENV') ?? 'development';
  }
}
