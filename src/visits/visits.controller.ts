import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpException,
  HttpStatus,
  Logger,
  Param,
  Post,
  Query,
  UploadedFile,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { Throttle } from '@nestjs/throttler';
import {
  ApiBadRequestResponse,
  ApiBody,
  ApiConflictResponse,
  ApiConsumes,
  ApiCreatedResponse,
  ApiForbiddenResponse,
  ApiGoneResponse,
  ApiHeader,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiParam,
  ApiResponse,
  ApiServiceUnavailableResponse,
  ApiTags,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { Principal, PrincipalGuard, PRINCIPAL_HEADER } from '../roles/principal.guard';
import {
  InvalidIdentityArtifactError,
  VisitError,
} from './domain/errors/visit.errors';
import { IdentitySubmissionResponseDto } from './dto/identity-submission-response.dto';
import { IssueVisitDto } from './dto/issue-visit.dto';
import { IssuedVisitResponseDto } from './dto/issued-visit-response.dto';
import { VisitResponseDto } from './dto/visit-response.dto';
import { VisitSignatureDto } from './dto/visit-signature.dto';
import { VisitsService } from './visits.service';

// Upper bound for multer; the configured per-deployment cap is applied by the identity gate
const MAX_UPLOAD_BYTES = 25 * 1024 * 1024;

/**
 * Visits Controller
 *
 * Hosts issue visits, visitors redeem them and upload an ID image, security
 * confirms entry at the gate.
 *
 * Token and signature never appear in logs.
 */
@ApiTags('Visits')
@Controller({ path: 'visits', version: '1' })
export class VisitsController {
  private readonly logger = new Logger(VisitsController.name);

  constructor(private readonly visitsService: VisitsService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @UseGuards(PrincipalGuard)
  @ApiHeader({ name: PRINCIPAL_HEADER, description: 'Issuing host' })
  @ApiOperation({
    summary: 'Issue Visit',
    description:
      'Create a visit for a guest. The returned redemption URL is valid until the end of the day.',
  })
  @ApiCreatedResponse({ type: IssuedVisitResponseDto })
  @ApiBadRequestResponse({ description: 'Missing or blank visit details' })
  @ApiUnauthorizedResponse({ description: 'Missing principal header' })
  @ApiForbiddenResponse({ description: 'Principal is not a host' })
  async issueVisit(
    @Principal() principalId: string,
    @Body() dto: IssueVisitDto,
  ): Promise<IssuedVisitResponseDto> {
    try {
      return await this.visitsService.issueVisit(dto, principalId);
    } catch (error) {
      throw this.handleError(error);
    }
  }

  @Get(':token')
  @Throttle({ default: { limit: 120, ttl: 60000 } })
  @ApiOperation({
    summary: 'Redeem Visit',
    description:
      'Validate a visit token and return its status, including the stay countdown once entry is confirmed. Safe to poll.',
  })
  @ApiParam({ name: 'token', type: String })
  @ApiOkResponse({ type: VisitResponseDto })
  @ApiNotFoundResponse({ description: 'Unknown token' })
  @ApiUnauthorizedResponse({ description: 'Signature missing or invalid' })
  @ApiGoneResponse({ description: 'Token expired for the day' })
  async getVisit(
    @Param('token') token: string,
    @Query() query: VisitSignatureDto,
  ): Promise<VisitResponseDto> {
    try {
      return await this.visitsService.getVisit(token, query.signature);
    } catch (error) {
      throw this.handleError(error);
    }
  }

  @Post(':token/identity')
  @HttpCode(HttpStatus.OK)
  @Throttle({ default: { limit: 10, ttl: 60000 } })
  @ApiOperation({
    summary: 'Submit Identity Document',
    description:
      'Upload a photo of an ID document. A rejected image leaves the visit unchanged and may be retried.',
  })
  @ApiConsumes('multipart/form-data')
  @ApiBody({
    schema: {
      type: 'object',
      properties: {
        artifact: {
          type: 'string',
          format: 'binary',
          description: 'ID document image (JPEG, PNG)',
        },
        signature: { type: 'string' },
      },
      required: ['artifact'],
    },
  })
  @ApiParam({ name: 'token', type: String })
  @ApiOkResponse({ type: IdentitySubmissionResponseDto })
  @ApiBadRequestResponse({ description: 'Missing, empty or non-image upload' })
  @ApiServiceUnavailableResponse({ description: 'Detector unavailable' })
  @UseInterceptors(
    FileInterceptor('artifact', {
      limits: {
        fileSize: MAX_UPLOAD_BYTES,
        files: 1,
      },
    }),
  )
  async submitIdentity(
    @Param('token') token: string,
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body() dto: VisitSignatureDto,
  ): Promise<IdentitySubmissionResponseDto> {
    try {
      if (!file) {
        throw new InvalidIdentityArtifactError('Identity artifact is required');
      }
      return await this.visitsService.submitIdentity(
        token,
        {
          fileName: file.originalname,
          mimeType: file.mimetype,
          content: file.buffer,
        },
        dto.signature,
      );
    } catch (error) {
      throw this.handleError(error);
    }
  }

  @Post(':token/confirm')
  @HttpCode(HttpStatus.OK)
  @UseGuards(PrincipalGuard)
  @ApiHeader({ name: PRINCIPAL_HEADER, description: 'Confirming security officer' })
  @ApiOperation({
    summary: 'Confirm Entry',
    description:
      'Record the visitor entering the premises. Starts the stay countdown and succeeds once per visit.',
  })
  @ApiParam({ name: 'token', type: String })
  @ApiOkResponse({ type: VisitResponseDto })
  @ApiForbiddenResponse({ description: 'Principal is not security staff' })
  @ApiGoneResponse({ description: 'Token expired for the day' })
  @ApiResponse({
    status: HttpStatus.PRECONDITION_FAILED,
    description: 'Identity not verified yet',
  })
  @ApiConflictResponse({ description: 'Entry already confirmed' })
  async confirmEntry(
    @Principal() principalId: string,
    @Param('token') token: string,
    @Body() dto: VisitSignatureDto,
  ): Promise<VisitResponseDto> {
    try {
      return await this.visitsService.confirmEntry(
        token,
        principalId,
        dto.signature,
      );
    } catch (error) {
      throw this.handleError(error);
    }
  }

  /**
   * Convert VisitError to HttpException
   */
  private handleError(error: unknown): HttpException {
    if (error instanceof VisitError) {
      return new HttpException(error.toJSON(), error.status);
    }

    if (error instanceof HttpException) {
      return error;
    }

    this.logger.error(
      `Unexpected error: ${error instanceof Error ? error.message : 'Unknown'}`,
    );

    return new HttpException(
      {
        error: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred',
        status: HttpStatus.INTERNAL_SERVER_ERROR,
      },
      HttpStatus.INTERNAL_SERVER_ERROR,
    );
  }
}
