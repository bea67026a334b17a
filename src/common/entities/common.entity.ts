import {
  PrimaryGeneratedColumn,
  CreateDateColumn,
  UpdateDateColumn,
} from 'typeorm';

/**
 * 通用实体基类
 * 提供所有可变实体共享的字段：UUID 主键、创建/更新时间戳
 *
 * 身份数据不做物理软删除：用户/权限通过 status/active 停用，
 * 角色只允许在无引用时删除，因此这里不再提供 deletedAt
 */
export abstract class CommonEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updatedAt!: Date;
}
