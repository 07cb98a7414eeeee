import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, UpdateDateColumn, Index } from 'typeorm';
import { AlertCondition, AlertLevel } from '../../common/types/telemetry.types';

@Entity('alert_rules')
@Index(['metric_name', 'enabled'])
export class AlertRule {
  @PrimaryGeneratedColumn('uuid')
  rule_id!: string;

  @Column({ type: 'varchar', length: 200 })
  name!: string;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Column({ type: 'varchar', length: 100 })
  metric_name!: string;

  @Column({ type: 'varchar', length: 2 })
  condition!: AlertCondition;

  @Column({ type: 'varchar', length: 200 })
  threshold_value!: string;

  @Column({ type: 'int', default: 300 })
  evaluation_window!: number;

  @Column({ type: 'int', default: 1 })
  trigger_count!: number;

  @Column({ type: 'varchar', length: 20, default: 'warning' })
  level!: AlertLevel;

  @Column({ type: 'text', array: true, default: '{}' })
  device_ids!: string[];

  @Column({ type: 'text', array: true, default: '{}' })
  device_groups!: string[];

  @Column({ type: 'jsonb', default: {} })
  device_filters!: Record<string, unknown>;

  @Column({ type: 'text', array: true, default: '{}' })
  notification_channels!: string[];

  @Column({ type: 'int', default: 15 })
  cooldown_minutes!: number;

  @Column({ type: 'boolean', default: true })
  auto_resolve!: boolean;

  @Column({ type: 'int', default: 3600 })
  auto_resolve_timeout!: number;

  @Column({ type: 'boolean', default: true })
  enabled!: boolean;

  @Column({ type: 'text', array: true, default: '{}' })
  tags!: string[];

  @Column({ type: 'int', default: 0 })
  total_triggers!: number;

  @Column({ type: 'timestamptz', nullable: true })
  last_triggered!: Date | null;

  @Column({ type: 'varchar', length: 100 })
  created_by!: string;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updated_at!: Date;
}
