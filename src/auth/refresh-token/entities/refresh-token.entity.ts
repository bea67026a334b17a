import { Entity, Column, CreateDateColumn, Index, PrimaryColumn } from 'typeorm';

/**
 * Refresh Token 记录
 *
 * 只保存 SHA-256 摘要，原文仅在签发时返回给客户端一次。
 * revokedAt 一旦写入即永久失效；轮换时 replacedBy 指向新记录，形成可追溯的链。
 */
@Entity('refresh_tokens')
@Index('IDX_refresh_tokens_user', ['userId'])
export class RefreshToken {
  /**
   * 由应用侧生成，轮换时旧记录的 replacedBy 需要在新记录写入前确定
   */
  @PrimaryColumn('uuid')
  id!: string;

  @Column({ name: 'user_id', type: 'uuid' })
  userId!: string;

  @Index('UQ_refresh_tokens_token_hash', { unique: true })
  @Column({ name: 'token_hash', length: 64 })
  tokenHash!: string;

  @Column({ name: 'expires_at', type: 'timestamptz' })
  expiresAt!: Date;

  @Column({ name: 'revoked_at', type: 'timestamptz', nullable: true })
  revokedAt!: Date | null;

  @Column({ name: 'replaced_by', type: 'uuid', nullable: true })
  replacedBy!: string | null;

  @Column({ name: 'ip_address', type: 'varchar', nullable: true })
  ipAddress!: string | null;

  @Column({ name: 'user_agent', type: 'varchar', nullable: true })
  userAgent!: string | null;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;
}
