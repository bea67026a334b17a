import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { RoleService } from './role.service';
import { RolePermissionService } from './role-permission.service';
import {
  AddRolePermissionsDto,
  ListRolesQueryDto,
  ReplaceRolePermissionsDto,
  RoleRequestDto,
  RoleResponseDto,
} from './dto/role.dto';
import { PermissionResponseDto } from '../permission/dto/permission.dto';
import { Permission } from '../permission/entities/permission.entity';
import { CurrentActor } from '../common/decorators/current-actor.decorator';
import { RequestContext } from '../common/security/request-context';
import { requireAuthority } from '../common/security/authority';

function toPermissionResponses(permissions: Permission[]): PermissionResponseDto[] {
  return permissions.map((permission) => new PermissionResponseDto(permission));
}

@Controller('roles')
export class RoleController {
  constructor(
    private readonly roleService: RoleService,
    private readonly rolePermissionService: RolePermissionService,
  ) {}

  @Get()
  async list(@CurrentActor() ctx: RequestContext, @Query() query: ListRolesQueryDto): Promise<RoleResponseDto[]> {
    requireAuthority(ctx, 'roles.read');
    const roles = await this.roleService.list(ctx, query.organizationId);
    return roles.map((role) => new RoleResponseDto(role));
  }

  @Get(':id')
  async get(@CurrentActor() ctx: RequestContext, @Param('id', ParseUUIDPipe) id: string): Promise<RoleResponseDto> {
    requireAuthority(ctx, 'roles.read');
    return new RoleResponseDto(await this.roleService.get(ctx, id));
  }

  @Post()
  async create(@CurrentActor() ctx: RequestContext, @Body() body: RoleRequestDto): Promise<RoleResponseDto> {
    requireAuthority(ctx, 'roles.create');
    return new RoleResponseDto(await this.roleService.create(ctx, body));
  }

  @Put(':id')
  async update(
    @CurrentActor() ctx: RequestContext,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() body: RoleRequestDto,
  ): Promise<RoleResponseDto> {
    requireAuthority(ctx, 'roles.update');
    return new RoleResponseDto(await this.roleService.update(ctx, id, body));
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async delete(@CurrentActor() ctx: RequestContext, @Param('id', ParseUUIDPipe) id: string): Promise<void> {
    requireAuthority(ctx, 'roles.delete');
    await this.roleService.delete(ctx, id);
  }

  // ---------- 角色权限 ----------

  @Get(':id/permissions')
  async listPermissions(
    @CurrentActor() ctx: RequestContext,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<PermissionResponseDto[]> {
    requireAuthority(ctx, 'roles.read');
    return toPermissionResponses(await this.rolePermissionService.listPermissions(ctx, id));
  }

  @Put(':id/permissions')
  async replacePermissions(
    @CurrentActor() ctx: RequestContext,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() body: ReplaceRolePermissionsDto,
  ): Promise<PermissionResponseDto[]> {
    requireAuthority(ctx, 'roles.update');
    return toPermissionResponses(await this.rolePermissionService.replacePermissions(ctx, id, body.permissionIds));
  }

  @Post(':id/permissions')
  @HttpCode(HttpStatus.OK)
  async addPermissions(
    @CurrentActor() ctx: RequestContext,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() body: AddRolePermissionsDto,
  ): Promise<PermissionResponseDto[]> {
    requireAuthority(ctx, 'roles.update');
    return toPermissionResponses(await this.rolePermissionService.addPermissions(ctx, id, body.permissionIds));
  }

  @Delete(':id/permissions/:permissionId')
  @HttpCode(HttpStatus.NO_CONTENT)
  async removePermission(
    @CurrentActor() ctx: RequestContext,
    @Param('id', ParseUUIDPipe) id: string,
    @Param('permissionId', ParseUUIDPipe) permissionId: string,
  ): Promise<void> {
    requireAuthority(ctx, 'roles.update');
    await this.rolePermissionService.removePermission(ctx, id, permissionId);
  }
}
