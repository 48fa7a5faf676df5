import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class IssueVisitDto {
  @ApiProperty({ example: 'Ada Lovelace' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  visitorName!: string;

  @ApiProperty({ example: 'Charles Babbage' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  hostName!: string;

  @ApiProperty({ example: 'Building B, floor 3' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  location!: string;

  @ApiProperty({ example: 'Design review' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(500)
  purpose!: string;

  @ApiProperty({
    description:
      'Free-text stay length, e.g. "45 minutes", "2 hours" or "1:30". Unrecognised text means 30 minutes.',
    example: '2 hours',
  })
  @IsString()
  @MaxLength(50)
  duration!: string;
}
