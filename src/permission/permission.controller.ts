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
import { PermissionService } from './permission.service';
import { ListPermissionsQueryDto, PermissionRequestDto, PermissionResponseDto } from './dto/permission.dto';
import { CurrentActor } from '../common/decorators/current-actor.decorator';
import { RequestContext } from '../common/security/request-context';
import { requireAuthority } from '../common/security/authority';

@Controller('permissions')
export class PermissionController {
  constructor(private readonly permissionService: PermissionService) {}

  @Get()
  async list(
    @CurrentActor() ctx: RequestContext,
    @Query() query: ListPermissionsQueryDto,
  ): Promise<PermissionResponseDto[]> {
    requireAuthority(ctx, 'permissions.read');
    const permissions = await this.permissionService.list(ctx, query);
    return permissions.map((permission) => new PermissionResponseDto(permission));
  }

  @Get(':id')
  async get(
    @CurrentActor() ctx: RequestContext,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<PermissionResponseDto> {
    requireAuthority(ctx, 'permissions.read');
    return new PermissionResponseDto(await this.permissionService.get(ctx, id));
  }

  @Post()
  async create(
    @CurrentActor() ctx: RequestContext,
    @Body() body: PermissionRequestDto,
  ): Promise<PermissionResponseDto> {
    requireAuthority(ctx, 'permissions.create');
    return new PermissionResponseDto(await this.permissionService.create(ctx, body));
  }

  @Put(':id')
  async update(
    @CurrentActor() ctx: RequestContext,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() body: PermissionRequestDto,
  ): Promise<PermissionResponseDto> {
    requireAuthority(ctx, 'permissions.update');
    return new PermissionResponseDto(await this.permissionService.update(ctx, id, body));
  }

  /**
   * 软删除：停用并解除所有角色关联
   */
  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async deactivate(
    @CurrentActor() ctx: RequestContext,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<void> {
    requireAuthority(ctx, 'permissions.delete');
    await this.permissionService.deactivate(ctx, id);
  }
}
