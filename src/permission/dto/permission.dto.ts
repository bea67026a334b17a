import { Exclude, Expose, Transform } from 'class-transformer';
import { IsBoolean, IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { Permission, PermissionScope } from '../entities/permission.entity';
import { toOptionalBoolean } from '../../common/utils/transform.util';

/**
 * 创建/更新权限的请求体
 * permissionCode 不接受客户端传入，始终由 resource + action 计算
 */
export class PermissionRequestDto {
  /**
   * 目标机构，仅超级管理员需要填写
   */
  @IsOptional()
  @IsString()
  readonly organizationId?: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(128)
  readonly name!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  readonly resource!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  readonly action!: string;

  /**
   * 大小写不敏感；非法值由服务层返回 400
   */
  @IsOptional()
  @IsString()
  readonly scope?: string;

  @IsOptional()
  @IsString()
  @MaxLength(512)
  readonly description?: string;

  @IsOptional()
  @IsBoolean()
  readonly active?: boolean;
}

export class ListPermissionsQueryDto {
  @IsOptional()
  @IsString()
  readonly organizationId?: string;

  @IsOptional()
  @Transform(toOptionalBoolean)
  @IsBoolean()
  readonly active?: boolean;

  @IsOptional()
  @IsString()
  readonly resource?: string;

  @IsOptional()
  @IsString()
  readonly action?: string;

  /**
   * 仅对超级管理员生效
   */
  @IsOptional()
  @Transform(toOptionalBoolean)
  @IsBoolean()
  readonly includeSystem?: boolean;
}

@Exclude()
export class PermissionResponseDto {
  @Expose()
  id!: string;

  @Expose()
  orgId!: string;

  @Expose()
  name!: string;

  @Expose()
  permissionCode!: string;

  @Expose()
  scope!: PermissionScope;

  @Expose()
  resource!: string;

  @Expose()
  action!: string;

  @Expose()
  description!: string | null;

  @Expose()
  active!: boolean;

  @Expose()
  createdAt!: Date;

  @Expose()
  updatedAt!: Date;

  constructor(partial: Partial<Permission>) {
    Object.assign(this, partial);
  }
}
