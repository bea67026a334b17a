import { Entity, Column, CreateDateColumn, Index, PrimaryGeneratedColumn } from 'typeorm';

/**
 * 审计日志载荷
 * 固定包含操作者、动作、资源与目标 ID，其余字段按调用方原样保留
 */
export interface AuditPayload {
  actor_user_id: string;
  action: string;
  resource: string;
  target_ids: string[];
  [key: string]: unknown;
}

/**
 * 身份变更审计记录，只追加、不修改
 */
@Entity('audit_logs')
@Index('IDX_audit_logs_user_created', ['userId', 'createdAt'])
export class AuditLog {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  /**
   * 操作者 (actor) 的用户 ID
   */
  @Column({ name: 'user_id' })
  userId!: string;

  @Column()
  action!: string;

  @Column()
  resource!: string;

  @Column({ type: 'jsonb' })
  payload!: AuditPayload;

  @Column({ name: 'ip_address', type: 'varchar', nullable: true })
  ipAddress!: string | null;

  @Column({ name: 'user_agent', type: 'varchar', nullable: true })
  userAgent!: string | null;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;
}
