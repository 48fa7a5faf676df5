import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsOptional, IsString, MaxLength } from 'class-validator';

/**
 * Signature handed out with the token. Required only when the deployment
 * signs visits.
 */
export class VisitSignatureDto {
  @ApiPropertyOptional({
    description: 'Visit signature (base64url)',
  })
  @IsOptional()
  @IsString()
  @MaxLength(1024)
  signature?: string;
}
