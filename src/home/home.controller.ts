import {
  Controller,
  Get,
  HttpStatus,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ApiTags, ApiOperation, ApiOkResponse } from '@nestjs/swagger';

import { HomeService } from './home.service';
import { HealthService, HealthStatus } from './health.service';

@ApiTags('Home')
@Controller()
export class HomeController {
  constructor(
    private service: HomeService,
    private healthService: HealthService,
  ) {}

  @Get()
  @ApiOperation({
    summary: 'Get Application Information',
    description:
      'Get basic information about the API, including version and name. This is a public endpoint.',
  })
  @ApiOkResponse({
    description: 'Application information',
    schema: {
      type: 'object',
      properties: {
        name: { type: 'string', example: 'Visit Authorization API' },
        version: { type: 'string', example: '1.0.0' },
        description: { type: 'string' },
      },
    },
  })
  appInfo() {
    return this.service.appInfo();
  }

  @Get('health')
  @ApiOperation({
    summary: 'Health Check',
    description:
      'Check that the visit store is reachable. Answers 503 when it is not.',
  })
  @ApiOkResponse({
    description: 'Health status',
    schema: {
      type: 'object',
      properties: {
        status: { type: 'string', example: 'healthy' },
        store: {
          type: 'object',
          properties: {
            driver: { type: 'string', example: 'relational' },
            reachable: { type: 'boolean', example: true },
          },
        },
        signing: { type: 'string', example: 'hmac-sha256' },
        identityRequired: { type: 'boolean', example: true },
      },
    },
  })
  async health(): Promise<HealthStatus> {
    const health = await this.healthService.check();
    if (health.status !== 'healthy') {
      throw new ServiceUnavailableException({
        error: 'UNHEALTHY',
        message: 'Visit store is unreachable',
        status: HttpStatus.SERVICE_UNAVAILABLE,
        health,
      });
    }
    return health;
  }
}
