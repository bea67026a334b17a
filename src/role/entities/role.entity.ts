import { Entity, Column, Index } from 'typeorm';
import { CommonEntity } from '../../common/entities/common.entity';

/**
 * 角色
 * 权限不再以 jsonb 内嵌，统一通过 role_permissions 关联表维护
 */
@Entity('roles')
@Index('UQ_roles_org_name', ['orgId', 'name'], { unique: true })
@Index('UQ_roles_org_code', ['orgId', 'roleCode'], { unique: true })
export class Role extends CommonEntity {
  @Column({ name: 'org_id' })
  orgId!: string;

  @Column()
  name!: string;

  @Column({ name: 'role_code' })
  roleCode!: string;

  @Column({ type: 'varchar', nullable: true })
  description!: string | null;
}
