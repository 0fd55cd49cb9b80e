import { Entity, PrimaryColumn, Column, Index } from 'typeorm';

/**
 * TypeORM entity for Message
 *
 * Timestamps are normalized ISO strings; lexical order is instant order on
 * PostgreSQL and SQLite alike.
 */
@Entity('messages')
@Index('idx_messages_ts', ['ts', 'messageId'])
@Index('idx_messages_from', ['fromMsisdn'])
export class MessageEntity {
  @PrimaryColumn({ type: 'varchar', name: 'message_id' })
  messageId!: string;

  @Column({ type: 'varchar', name: 'from_msisdn' })
  fromMsisdn!: string;

  @Column({ type: 'varchar', name: 'to_msisdn' })
  toMsisdn!: string;

  @Column({ type: 'varchar' })
  ts!: string;

  @Column({ type: 'text', nullable: true })
  text!: string | null;

  @Column({ type: 'varchar', name: 'created_at' })
  createdAt!: string;
}
