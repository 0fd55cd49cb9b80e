import { MigrationInterface, QueryRunner, Table, TableIndex } from 'typeorm';

export class CreateMessagesTable1736935200000 implements MigrationInterface {
  name = 'CreateMessagesTable1736935200000';

  async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: 'messages',
        columns: [
          { name: 'message_id', type: 'varchar', isPrimary: true },
          { name: 'from_msisdn', type: 'varchar', isNullable: false },
          { name: 'to_msisdn', type: 'varchar', isNullable: false },
          { name: 'ts', type: 'varchar', isNullable: false },
          { name: 'text', type: 'text', isNullable: true },
          { name: 'created_at', type: 'varchar', isNullable: false },
        ],
      }),
      true,
    );

    await queryRunner.createIndex(
      'messages',
      new TableIndex({
        name: 'idx_messages_ts',
        columnNames: ['ts', 'message_id'],
      }),
    );
    await queryRunner.createIndex(
      'messages',
      new TableIndex({
        name: 'idx_messages_from',
        columnNames: ['from_msisdn'],
      }),
    );
  }

  async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropIndex('messages', 'idx_messages_from');
    await queryRunner.dropIndex('messages', 'idx_messages_ts');
    await queryRunner.dropTable('messages');
  }
}
