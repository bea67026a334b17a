import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Permission } from './entities/permission.entity';
import { RolePermission } from '../role/entities/role-permission.entity';
import { User } from '../user/entities/user.entity';
import { PermissionService } from './permission.service';
import { PermissionResolverService } from './permission-resolver.service';
import { PermissionController } from './permission.controller';
import { AuditModule } from '../audit/audit.module';

@Module({
  imports: [TypeOrmModule.forFeature([Permission, RolePermission, User]), AuditModule],
  controllers: [PermissionController],
  providers: [PermissionService, PermissionResolverService],
  // 解析服务供 auth / user 模块计算有效权限
  exports: [PermissionService, PermissionResolverService],
})
export class PermissionModule {}
