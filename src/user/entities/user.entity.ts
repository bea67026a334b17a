import { Entity, Column, Index } from 'typeorm';
import { CommonEntity } from '../../common/entities/common.entity';

export const USER_STATUSES = ['active', 'inactive'] as const;

export type UserStatus = (typeof USER_STATUSES)[number];

@Entity('users')
@Index('UQ_users_org_email', ['orgId', 'email'], { unique: true })
@Index('UQ_users_org_phone', ['orgId', 'phone'], { unique: true })
export class User extends CommonEntity {
  @Column({ name: 'org_id' })
  orgId!: string;

  @Column({ name: 'full_name' })
  fullName!: string;

  /**
   * 统一以小写存储，登录时按小写匹配实现大小写不敏感
   */
  @Column({ type: 'varchar', nullable: true })
  email!: string | null;

  @Column({ type: 'varchar', nullable: true })
  phone!: string | null;

  @Column({ name: 'password_hash', type: 'varchar', nullable: true })
  passwordHash!: string | null;

  @Column({ type: 'varchar', length: 16, default: 'active' })
  status!: UserStatus;

  /**
   * 角色引用：roleIds 与 roleCodes 必须指向同一组角色，
   * 由 UserService.resolveRoles 统一写入，不接受客户端单独修改其中一个
   */
  @Column({ name: 'role_ids', type: 'text', array: true, default: () => "'{}'" })
  roleIds!: string[];

  @Column({ name: 'role_codes', type: 'text', array: true, default: () => "'{}'" })
  roleCodes!: string[];
}
