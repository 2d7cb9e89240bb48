import { MigrationInterface, QueryRunner, Table, TableIndex } from 'typeorm'

export class InitialSchema1730000000000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    // Create accounts table
    await queryRunner.createTable(
      new Table({
        name: 'accounts',
        columns: [
          {
            name: 'id',
            type: 'int',
            isPrimary: true,
            isGenerated: true,
            generationStrategy: 'increment',
          },
          {
            name: 'phone_number',
            type: 'varchar',
            length: '15',
            isUnique: true,
          },
          {
            name: 'name',
            type: 'text',
            isNullable: true,
          },
          {
            name: 'national_id',
            type: 'varchar',
            length: '10',
            isNullable: true,
          },
          {
            name: 'is_phone_verified',
            type: 'boolean',
            default: false,
          },
          {
            name: 'created_at',
            type: 'timestamp',
            default: 'now()',
          },
          {
            name: 'updated_at',
            type: 'timestamp',
            default: 'now()',
          },
        ],
      }),
      true
    )

    await queryRunner.createIndex(
      'accounts',
      new TableIndex({
        name: 'idx_accounts_created_at',
        columnNames: ['created_at'],
      })
    )

    // Create otp_codes table
    await queryRunner.createTable(
      new Table({
        name: 'otp_codes',
        columns: [
          {
            name: 'id',
            type: 'int',
            isPrimary: true,
            isGenerated: true,
            generationStrategy: 'increment',
          },
          {
            name: 'phone_number',
            type: 'varchar',
            length: '15',
          },
          {
            name: 'code_hash',
            type: 'varchar',
            length: '255',
          },
          {
            name: 'purpose',
            type: 'varchar',
            length: '10',
          },
          {
            name: 'expires_at',
            type: 'timestamp',
          },
          {
            name: 'consumed',
            type: 'boolean',
            default: false,
          },
          {
            name: 'consumed_at',
            type: 'timestamp',
            isNullable: true,
          },
          {
            name: 'created_at',
            type: 'timestamp',
            default: 'now()',
          },
        ],
        checks: [
          {
            name: 'chk_otp_codes_purpose',
            expression: `"purpose" IN ('register', 'login')`,
          },
        ],
      }),
      true
    )

    await queryRunner.createIndex(
      'otp_codes',
      new TableIndex({
        name: 'idx_otp_codes_phone_created',
        columnNames: ['phone_number', 'created_at'],
      })
    )

    await queryRunner.createIndex(
      'otp_codes',
      new TableIndex({
        name: 'idx_otp_codes_phone_purpose_consumed',
        columnNames: ['phone_number', 'purpose', 'consumed'],
      })
    )
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropTable('otp_codes')
    await queryRunner.dropTable('accounts')
  }
}
