import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryColumn,
  VersionColumn,
} from 'typeorm';

@Entity({
  name: 'visit_records',
})
export class VisitRecordEntity {
  @PrimaryColumn({ type: 'varchar', length: 128 })
  token!: string;

  @Column({ type: 'text', nullable: true })
  signature!: string | null;

  @Column({ name: 'visitor_name', type: 'varchar', length: 255 })
  visitorName!: string;

  @Column({ name: 'host_name', type: 'varchar', length: 255 })
  hostName!: string;

  @Column({ type: 'varchar', length: 255 })
  location!: string;

  @Column({ type: 'varchar', length: 255 })
  purpose!: string;

  // ISO-8601 duration, e.g. PT1H30M
  @Column({ name: 'requested_duration', type: 'varchar', length: 32 })
  requestedDuration!: string;

  @Column({ name: 'issued_at', type: 'timestamptz' })
  issuedAt!: Date;

  @Column({ name: 'daily_expiry', type: 'timestamptz' })
  @Index('IDX_visit_records_daily_expiry')
  dailyExpiry!: Date;

  @Column({ name: 'identity_verified', type: 'boolean', default: false })
  identityVerified!: boolean;

  @Column({
    name: 'identity_artifact',
    type: 'varchar',
    length: 255,
    nullable: true,
  })
  identityArtifact!: string | null;

  @Column({ name: 'confirmed_at', type: 'timestamptz', nullable: true })
  confirmedAt!: Date | null;

  @Column({ name: 'issued_by', type: 'varchar', length: 128 })
  @Index('IDX_visit_records_issued_by')
  issuedBy!: string;

  @Column({
    name: 'confirmed_by',
    type: 'varchar',
    length: 128,
    nullable: true,
  })
  confirmedBy!: string | null;

  @VersionColumn()
  version!: number;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;
}
