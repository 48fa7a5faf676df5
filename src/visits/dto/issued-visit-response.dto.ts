import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { VisitResponseDto } from './visit-response.dto';

export class IssuedVisitResponseDto {
  @ApiProperty({ description: 'Visit token (base64url)' })
  token!: string;

  @ApiPropertyOptional({
    description: 'Signature over the visit details; null when signing is off',
    nullable: true,
  })
  signature!: string | null;

  @ApiProperty({
    description: 'Link to encode in the QR code handed to the visitor',
    example:
      'https://visits.example.com/api/v1/visits/3q2-7w?signature=abc',
  })
  redemptionUrl!: string;

  @ApiProperty({ type: VisitResponseDto })
  visit!: VisitResponseDto;
}
