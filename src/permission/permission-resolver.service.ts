import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { Permission } from './entities/permission.entity';
import { RolePermission } from '../role/entities/role-permission.entity';
import { User } from '../user/entities/user.entity';
import { isBlank, uniqueValues } from '../common/utils/text.util';

/**
 * 有效权限解析：用户 → 角色 → 角色权限 → 权限
 *
 * 每次都从数据库重新计算，active 在读取时过滤，
 * 即使残留了指向已停用权限的 role_permissions 记录也不会生效。
 */
@Injectable()
export class PermissionResolverService {
  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
    @InjectRepository(RolePermission)
    private readonly rolePermissionRepository: Repository<RolePermission>,
    @InjectRepository(Permission)
    private readonly permissionRepository: Repository<Permission>,
  ) {}

  async resolvePermissions(userId: string): Promise<Permission[]> {
    const user = await this.userRepository.findOneBy({ id: userId });
    if (!user) {
      throw new NotFoundException('User not found');
    }

    const roleIds = uniqueValues(user.roleIds);
    if (!roleIds.length) {
      return [];
    }

    const mappings = await this.rolePermissionRepository.findBy({ roleId: In(roleIds) });
    const permissionIds = uniqueValues(mappings.map((mapping) => mapping.permissionId));
    if (!permissionIds.length) {
      return [];
    }

    const permissions = await this.permissionRepository.findBy({ id: In(permissionIds), active: true });
    const byId = new Map(permissions.map((permission) => [permission.id, permission]));
    return [...byId.values()].sort((a, b) => a.permissionCode.localeCompare(b.permissionCode));
  }

  async resolvePermissionCodes(userId: string): Promise<string[]> {
    const permissions = await this.resolvePermissions(userId);
    const codes = permissions
      .map((permission) => permission.permissionCode)
      .filter((code) => !isBlank(code));
    return uniqueValues(codes).sort();
  }
}
