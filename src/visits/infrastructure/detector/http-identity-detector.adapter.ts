import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Type, plainToClass } from 'class-transformer';
import {
  IsArray,
  IsNumber,
  IsString,
  Max,
  Min,
  ValidateNested,
  validateSync,
} from 'class-validator';
import { randomUUID } from 'crypto';
import { AllConfigType } from '../../../config/config.type';
import { DetectorUnavailableError } from '../../domain/errors/visit.errors';
import {
  Detection,
  IdentityArtifact,
  IdentityDetectorPort,
} from '../../domain/ports/identity-detector.port';

class DetectionDto {
  @IsString()
  label!: string;

  @IsNumber()
  @Min(0)
  @Max(1)
  confidence!: number;
}

class DetectorResponseDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => DetectionDto)
  detections!: DetectionDto[];
}

/**
 * HTTP client for the ID-card detection model.
 *
 * Contract: POST {baseUrl}/detect, multipart field "image", answered with
 * { detections: [{ label, confidence }] }.
 *
 * A missing URL, a network error or timeout, a non-2xx answer and a body of
 * the wrong shape all surface as DetectorUnavailableError. Image bytes and
 * file names are never logged.
 */
@Injectable()
export class HttpIdentityDetectorAdapter implements IdentityDetectorPort {
  private readonly logger = new Logger(HttpIdentityDetectorAdapter.name);
  private readonly baseUrl?: string;
  private readonly timeoutMs: number;

  constructor(private readonly configService: ConfigService<AllConfigType>) {
    this.baseUrl = this.configService.get('visits.identity.detectorUrl', {
      infer: true,
    });
    this.timeoutMs = this.configService.getOrThrow(
      'visits.identity.detectorTimeoutMs',
      { infer: true },
    );

    if (!this.baseUrl) {
      this.logger.warn(
        'VISIT_IDENTITY_DETECTOR_URL is not set; identity submissions will report the detector as unavailable',
      );
    }
  }

  async detect(artifact: IdentityArtifact): Promise<Detection[]> {
    if (!this.baseUrl) {
      throw new DetectorUnavailableError('detector URL is not configured');
    }

    const requestId = randomUUID();
    const startTime = Date.now();

    const form = new FormData();
    form.append(
      'image',
      new Blob([artifact.content], { type: artifact.mimeType }),
      'artifact',
    );

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/detect`, {
        method: 'POST',
        body: form,
        headers: { 'X-Request-Id': requestId },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(
        `[Detector] request failed | RequestId: ${requestId} | Error: ${message}`,
      );
      throw new DetectorUnavailableError(message);
    }

    const duration = Date.now() - startTime;

    if (!response.ok) {
      this.logger.error(
        `[Detector] POST /detect | Status: ${response.status} | Duration: ${duration}ms | RequestId: ${requestId}`,
      );
      throw new DetectorUnavailableError(`detector answered ${response.status}`);
    }

    this.logger.debug(
      `[Detector] POST /detect | Status: ${response.status} | Duration: ${duration}ms | RequestId: ${requestId}`,
    );

    return this.parseDetections(await this.readJson(response));
  }

  private async readJson(response: Response): Promise<unknown> {
    try {
      return await response.json();
    } catch {
      throw new DetectorUnavailableError('detector returned invalid JSON');
    }
  }

  private parseDetections(body: unknown): Detection[] {
    if (typeof body !== 'object' || body === null) {
      throw new DetectorUnavailableError('detector returned no detections');
    }

    const parsed = plainToClass(DetectorResponseDto, body);
    const errors = validateSync(parsed);
    if (errors.length > 0) {
      throw new DetectorUnavailableError(
        `detector response malformed (${errors.map((e) => e.property).join(', ')})`,
      );
    }

    return parsed.detections.map((detection) => ({
      label: detection.label,
      confidence: detection.confidence,
    }));
  }
}
