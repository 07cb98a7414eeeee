import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, UpdateDateColumn } from 'typeorm';
import { DataType, MetricType } from '../../common/types/telemetry.types';

@Entity('metric_definitions')
export class MetricDefinition {
  @PrimaryGeneratedColumn('uuid')
  metric_id!: string;

  @Column({ type: 'varchar', length: 100, unique: true })
  name!: string;

  @Column({ type: 'varchar', length: 500, nullable: true })
  description!: string | null;

  @Column({ type: 'varchar', length: 20 })
  data_type!: DataType;

  @Column({ type: 'varchar', length: 20 })
  metric_type!: MetricType;

  @Column({ type: 'varchar', length: 20, nullable: true })
  unit!: string | null;

  @Column({ type: 'double precision', nullable: true })
  min_value!: number | null;

  @Column({ type: 'double precision', nullable: true })
  max_value!: number | null;

  @Column({ type: 'int', default: 90 })
  retention_days!: number;

  @Column({ type: 'int', default: 60 })
  aggregation_interval!: number;

  @Column({ type: 'text', array: true, default: '{}' })
  tags!: string[];

  @Column({ type: 'jsonb', default: {} })
  metadata!: Record<string, unknown>;

  @Column({ type: 'varchar', length: 100 })
  created_by!: string;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updated_at!: Date;
}
