import {
  Entity,
  PrimaryColumn,
  Column,
  CreateDateColumn,
} from 'typeorm';

export const JOB_STATUSES = ['queued', 'processing', 'completed', 'error'] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

export const TERMINAL_STATUSES: readonly JobStatus[] = ['completed', 'error'];

@Entity('jobs')
export class Job {
  @PrimaryColumn('uuid')
  id!: string;

  @CreateDateColumn()
  created_at!: Date;

  @Column({ type: 'varchar', length: 20, default: 'queued' })
  status!: JobStatus;

  @Column({ type: 'text', default: '' })
  progress!: string;

  @Column({ type: 'int', default: 0 })
  percent!: number;

  @Column({ type: 'text' })
  input_text!: string;

  @Column({ type: 'varchar', length: 40, nullable: true })
  voice!: string | null;

  @Column({ type: 'text', nullable: true })
  script!: string | null;

  @Column({ type: 'text', nullable: true })
  result_location!: string | null;

  @Column({ type: 'text', nullable: true })
  local_path!: string | null;

  @Column({ type: 'text', nullable: true })
  error_message!: string | null;

  @Column({ type: 'timestamptz', nullable: true })
  started_at!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  completed_at!: Date | null;
}

export type JobPatch = Partial<Omit<Job, 'id' | 'created_at'>>;

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}
