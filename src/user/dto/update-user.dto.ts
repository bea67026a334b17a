import { IsArray, IsNotEmpty, IsOptional, IsString, IsUUID, MaxLength, MinLength } from 'class-validator';

/**
 * 资料更新：未出现的字段保持不变，email/phone 传空串表示清空
 */
export class UpdateUserDto {
  @IsOptional()
  @IsString()
  readonly organizationId?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(128)
  readonly fullName?: string;

  @IsOptional()
  @IsString()
  @MaxLength(254)
  readonly email?: string;

  @IsOptional()
  @IsString()
  @MaxLength(32)
  readonly phone?: string;

  @IsOptional()
  @IsString()
  @MinLength(8)
  @MaxLength(72)
  readonly password?: string;
}

/**
 * 角色分配，可按 ID 或 code 指定；两者同时提供时必须指向同一组角色，都不提供表示清空
 */
export class UpdateUserRolesDto {
  @IsOptional()
  @IsArray()
  @IsUUID('all', { each: true })
  readonly roleIds?: string[];

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  readonly roleCodes?: string[];
}

export class UpdateUserStatusDto {
  @IsString()
  @IsNotEmpty()
  readonly status!: string;
}
