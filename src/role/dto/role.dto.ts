import { Exclude, Expose } from 'class-transformer';
import { ArrayNotEmpty, IsArray, IsNotEmpty, IsOptional, IsString, IsUUID, Matches, MaxLength } from 'class-validator';
import { Role } from '../entities/role.entity';

export class RoleRequestDto {
  /**
   * 目标机构，仅超级管理员需要填写；已有角色不允许迁移机构
   */
  @IsOptional()
  @IsString()
  readonly organizationId?: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(128)
  readonly name!: string;

  /**
   * 写入用户 roleCodes 与 JWT roles 声明的稳定标识
   */
  @IsString()
  @Matches(/^[A-Za-z0-9_.-]+$/)
  @MaxLength(64)
  readonly roleCode!: string;

  @IsOptional()
  @IsString()
  @MaxLength(512)
  readonly description?: string;
}

export class ListRolesQueryDto {
  @IsOptional()
  @IsString()
  readonly organizationId?: string;
}

/**
 * 全量替换：空数组表示清空角色的全部权限
 */
export class ReplaceRolePermissionsDto {
  @IsArray()
  @IsUUID('all', { each: true })
  readonly permissionIds!: string[];
}

export class AddRolePermissionsDto {
  @IsArray()
  @ArrayNotEmpty()
  @IsUUID('all', { each: true })
  readonly permissionIds!: string[];
}

@Exclude()
export class RoleResponseDto {
  @Expose()
  id!: string;

  @Expose()
  orgId!: string;

  @Expose()
  name!: string;

  @Expose()
  roleCode!: string;

  @Expose()
  description!: string | null;

  @Expose()
  createdAt!: Date;

  @Expose()
  updatedAt!: Date;

  constructor(partial: Partial<Role>) {
    Object.assign(this, partial);
  }
}
