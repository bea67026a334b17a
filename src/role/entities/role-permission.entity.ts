import { Entity, Column, Index } from 'typeorm';
import { CommonEntity } from '../../common/entities/common.entity';

/**
 * 角色-权限关联 (多对多)
 * 角色与权限必须属于同一机构，由 RolePermissionService 在写入前校验
 */
@Entity('role_permissions')
@Index('UQ_role_permissions_role_permission', ['roleId', 'permissionId'], { unique: true })
@Index('IDX_role_permissions_permission', ['permissionId'])
export class RolePermission extends CommonEntity {
  @Column({ name: 'org_id' })
  orgId!: string;

  @Column({ name: 'role_id', type: 'uuid' })
  roleId!: string;

  @Column({ name: 'permission_id', type: 'uuid' })
  permissionId!: string;
}
