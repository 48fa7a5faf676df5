import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IdentityRejectionReason } from '../domain/utils/identity-verdict.util';
import { VisitResponseDto } from './visit-response.dto';

export class IdentitySubmissionResponseDto {
  @ApiProperty({ enum: ['accepted', 'rejected'], example: 'accepted' })
  status!: 'accepted' | 'rejected';

  @ApiPropertyOptional({
    enum: IdentityRejectionReason,
    description: 'Set when the image was rejected; the visitor may retry',
  })
  reason?: IdentityRejectionReason;

  @ApiProperty({ type: VisitResponseDto })
  visit!: VisitResponseDto;
}
