import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';

@Injectable()
export class HomeService {
  constructor(private configService: ConfigService<AllConfigType>) {}

  appInfo() {
    return {
      name: this.configService.get('app.name', { infer: true }),
      version: '1.0.0',
      description:
        'Issues same-day visit tokens, verifies visitor identity and records confirmed entry.',
    };
  }
}
