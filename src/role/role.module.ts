import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Role } from './entities/role.entity';
import { RolePermission } from './entities/role-permission.entity';
import { Permission } from '../permission/entities/permission.entity';
import { User } from '../user/entities/user.entity';
import { RoleService } from './role.service';
import { RolePermissionService } from './role-permission.service';
import { RoleController } from './role.controller';
import { AuditModule } from '../audit/audit.module';

@Module({
  imports: [TypeOrmModule.forFeature([Role, RolePermission, Permission, User]), AuditModule],
  controllers: [RoleController],
  providers: [RoleService, RolePermissionService],
  exports: [RoleService],
})
export class RoleModule {}
