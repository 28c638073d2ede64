import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Index } from 'typeorm';

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

export interface LogActor {
  id: string;
  username: string;
  role: string;
}

@Entity('logs')
export class Log {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column()
  action!: string;

  @Index()
  @Column({ length: 50 })
  module!: string;

  @Column({ type: 'enum', enum: ['info', 'warn', 'error', 'debug'], default: 'info' })
  level!: LogLevel;

  @Column('json', { nullable: true })
  performedBy!: LogActor | null;

  @Column({ type: 'varchar', nullable: true })
  entityId!: string | null;

  @Column({ type: 'varchar', nullable: true })
  entityType!: string | null;

  @Column('json', { nullable: true })
  newValues!: Record<string, unknown> | null;

  @Column('json', { nullable: true })
  metadata!: Record<string, unknown> | null;

  @CreateDateColumn()
  timestamp!: Date;
}
