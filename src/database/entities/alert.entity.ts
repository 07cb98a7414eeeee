import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, UpdateDateColumn, Index } from 'typeorm';
import { AlertLevel, AlertStatus } from '../../common/types/telemetry.types';

@Entity('alerts')
@Index(['device_id', 'triggered_at'])
@Index(['status', 'auto_resolve_at'])
export class Alert {
  @PrimaryGeneratedColumn('uuid')
  alert_id!: string;

  @Column({ type: 'uuid' })
  rule_id!: string;

  @Column({ type: 'varchar', length: 200 })
  rule_name!: string;

  @Column({ type: 'varchar', length: 100 })
  device_id!: string;

  @Column({ type: 'varchar', length: 100 })
  metric_name!: string;

  @Column({ type: 'varchar', length: 20 })
  level!: AlertLevel;

  @Column({ type: 'varchar', length: 20, default: 'active' })
  status!: AlertStatus;

  @Column({ type: 'text' })
  message!: string;

  @Column({ type: 'text' })
  current_value!: string;

  @Column({ type: 'text' })
  threshold_value!: string;

  @Column({ type: 'timestamptz' })
  triggered_at!: Date;

  @Column({ type: 'timestamptz', nullable: true })
  acknowledged_at!: Date | null;

  @Column({ type: 'varchar', length: 100, nullable: true })
  acknowledged_by!: string | null;

  @Column({ type: 'timestamptz', nullable: true })
  resolved_at!: Date | null;

  @Column({ type: 'varchar', length: 100, nullable: true })
  resolved_by!: string | null;

  @Column({ type: 'text', nullable: true })
  resolution_note!: string | null;

  @Column({ type: 'timestamptz', nullable: true })
  auto_resolve_at!: Date | null;

  @Column({ type: 'int', default: 1 })
  affected_devices_count!: number;

  @Column({ type: 'text', array: true, default: '{}' })
  tags!: string[];

  @Column({ type: 'jsonb', default: {} })
  metadata!: Record<string, unknown>;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updated_at!: Date;
}
