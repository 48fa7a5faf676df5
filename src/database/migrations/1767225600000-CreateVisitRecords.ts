import { MigrationInterface, QueryRunner, Table, TableIndex } from 'typeorm';

export class CreateVisitRecords1767225600000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: 'visit_records',
        columns: [
          {
            name: 'token',
            type: 'varchar',
            length: '128',
            isPrimary: true,
          },
          {
            name: 'signature',
            type: 'text',
            isNullable: true,
          },
          {
            name: 'visitor_name',
            type: 'varchar',
            length: '255',
            isNullable: false,
          },
          {
            name: 'host_name',
            type: 'varchar',
            length: '255',
            isNullable: false,
          },
          {
            name: 'location',
            type: 'varchar',
            length: '255',
            isNullable: false,
          },
          {
            name: 'purpose',
            type: 'varchar',
            length: '255',
            isNullable: false,
          },
          {
            name: 'requested_duration',
            type: 'varchar',
            length: '32',
            isNullable: false,
          },
          {
            name: 'issued_at',
            type: 'timestamptz',
            isNullable: false,
          },
          {
            name: 'daily_expiry',
            type: 'timestamptz',
            isNullable: false,
          },
          {
            name: 'identity_verified',
            type: 'boolean',
            default: false,
            isNullable: false,
          },
          {
            name: 'identity_artifact',
            type: 'varchar',
            length: '255',
            isNullable: true,
          },
          {
            name: 'confirmed_at',
            type: 'timestamptz',
            isNullable: true,
          },
          {
            name: 'issued_by',
            type: 'varchar',
            length: '128',
            isNullable: false,
          },
          {
            name: 'confirmed_by',
            type: 'varchar',
            length: '128',
            isNullable: true,
          },
          {
            // Optimistic lock for identity and confirmation updates
            name: 'version',
            type: 'integer',
            isNullable: false,
          },
          {
            name: 'created_at',
            type: 'timestamptz',
            default: 'now()',
            isNullable: false,
          },
        ],
      }),
      true,
    );

    await queryRunner.createIndex(
      'visit_records',
      new TableIndex({
        name: 'IDX_visit_records_daily_expiry',
        columnNames: ['daily_expiry'],
      }),
    );

    await queryRunner.createIndex(
      'visit_records',
      new TableIndex({
        name: 'IDX_visit_records_issued_by',
        columnNames: ['issued_by'],
      }),
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropIndex('visit_records', 'IDX_visit_records_issued_by');
    await queryRunner.dropIndex(
      'visit_records',
      'IDX_visit_records_daily_expiry',
    );
    await queryRunner.dropTable('visit_records');
  }
}
