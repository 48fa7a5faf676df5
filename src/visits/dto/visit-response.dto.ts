import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { VisitStage } from '../domain/enums/visit-stage.enum';

/**
 * Visit as shown to visitors, hosts and security staff.
 *
 * Carries neither the token nor the signature; callers already hold them.
 */
export class VisitResponseDto {
  @ApiProperty({ example: 'Ada Lovelace' })
  visitorName!: string;

  @ApiProperty({ example: 'Charles Babbage' })
  hostName!: string;

  @ApiProperty({ example: 'Building B, floor 3' })
  location!: string;

  @ApiProperty({ example: 'Design review' })
  purpose!: string;

  @ApiProperty({ description: 'ISO-8601 duration', example: 'PT2H' })
  requestedDuration!: string;

  @ApiProperty({ example: '2025-01-20T09:00:00.000Z' })
  issuedAt!: Date;

  @ApiProperty({
    description: 'Token stops working after this instant',
    example: '2025-01-20T23:59:59.000Z',
  })
  dailyExpiry!: Date;

  @ApiProperty({ enum: VisitStage, example: VisitStage.AWAITING_CONFIRMATION })
  stage!: VisitStage;

  @ApiProperty()
  identityVerified!: boolean;

  @ApiPropertyOptional({ nullable: true, example: null })
  confirmedAt!: Date | null;

  @ApiProperty()
  tokenExpired!: boolean;

  @ApiProperty()
  stayExpired!: boolean;

  @ApiPropertyOptional({
    description: 'Milliseconds left of the stay; null before entry',
    nullable: true,
    example: 1500000,
  })
  remainingStayMs!: number | null;

  @ApiPropertyOptional({
    nullable: true,
    example: '25 minutes',
  })
  remainingStay!: string | null;
}
