import { Exclude, Expose } from 'class-transformer';
import { User, UserStatus } from '../entities/user.entity';

/**
 * 用户响应 DTO
 * 默认排除所有字段，只返回 @Expose 标记的字段，passwordHash 永远不会出现在响应中
 */
@Exclude()
export class UserResponseDto {
  @Expose()
  id!: string;

  @Expose()
  orgId!: string;

  @Expose()
  fullName!: string;

  @Expose()
  email!: string | null;

  @Expose()
  phone!: string | null;

  @Expose()
  status!: UserStatus;

  @Expose()
  roleIds!: string[];

  @Expose()
  roleCodes!: string[];

  @Expose()
  createdAt!: Date;

  @Expose()
  updatedAt!: Date;

  constructor(partial: Partial<User>) {
    Object.assign(this, partial);
  }
}
