import { IsArray, IsEmail, IsNotEmpty, IsOptional, IsString, IsUUID, MaxLength, MinLength } from 'class-validator';

export class CreateUserDto {
  /**
   * 目标机构，仅超级管理员需要填写
   */
  @IsOptional()
  @IsString()
  readonly organizationId?: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(128)
  readonly fullName!: string;

  /**
   * 邮箱与手机号至少填写一个，邮箱统一转为小写存储
   */
  @IsOptional()
  @IsEmail()
  readonly email?: string;

  @IsOptional()
  @IsString()
  @MaxLength(32)
  readonly phone?: string;

  /**
   * 不填写时用户无法登录，直到管理员设置密码
   */
  @IsOptional()
  @IsString()
  @MinLength(8)
  @MaxLength(72)
  readonly password?: string;

  @IsOptional()
  @IsString()
  readonly status?: string;

  @IsOptional()
  @IsArray()
  @IsUUID('all', { each: true })
  readonly roleIds?: string[];

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  readonly roleCodes?: string[];
}
