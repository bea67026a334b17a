import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { User } from './entities/user.entity';
import { Role } from '../role/entities/role.entity';
import { UserService } from './user.service';
import { UserController } from './user.controller';
import { HashingModule } from '../common/hashing/hashing.module';
import { PermissionModule } from '../permission/permission.module';
import { AuditModule } from '../audit/audit.module';

@Module({
  imports: [TypeOrmModule.forFeature([User, Role]), HashingModule, PermissionModule, AuditModule],
  controllers: [UserController],
  providers: [UserService],
  // AuthModule 通过 UserService 查找登录用户、修改密码
  exports: [UserService],
})
export class UserModule {}
