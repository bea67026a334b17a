import { Entity, Column, Index } from 'typeorm';
import { CommonEntity } from '../../common/entities/common.entity';

export const PERMISSION_SCOPES = ['tenant', 'system'] as const;

/**
 * tenant：机构内可见、可分配
 * system：全局能力，仅超级管理员可见、可分配
 */
export type PermissionScope = (typeof PERMISSION_SCOPES)[number];

@Entity('permissions')
@Index('UQ_permissions_org_code', ['orgId', 'permissionCode'], { unique: true })
export class Permission extends CommonEntity {
  @Column({ name: 'org_id' })
  orgId!: string;

  @Column()
  name!: string;

  /**
   * 规范权限码：resource + "." + action
   * 每次写入都由服务端重新计算，不信任客户端传值
   */
  @Column({ name: 'permission_code' })
  permissionCode!: string;

  @Column({ type: 'varchar', length: 16, default: 'tenant' })
  scope!: PermissionScope;

  @Column()
  resource!: string;

  @Column()
  action!: string;

  @Column({ type: 'varchar', nullable: true })
  description!: string | null;

  @Column({ default: true })
  active!: boolean;
}
