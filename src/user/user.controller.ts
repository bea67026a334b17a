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
import { UserService } from './user.service';
import { CreateUserDto } from './dto/create-user.dto';
import { UpdateUserDto, UpdateUserRolesDto, UpdateUserStatusDto } from './dto/update-user.dto';
import { ListUsersQueryDto } from './dto/list-users-query.dto';
import { UserResponseDto } from './dto/user-response.dto';
import { CurrentActor } from '../common/decorators/current-actor.decorator';
import { RequestContext } from '../common/security/request-context';
import { requireAuthority } from '../common/security/authority';

@Controller('users')
export class UserController {
  constructor(private readonly userService: UserService) {}

  @Get()
  async list(@CurrentActor() ctx: RequestContext, @Query() query: ListUsersQueryDto): Promise<UserResponseDto[]> {
    requireAuthority(ctx, 'users.read');
    const users = await this.userService.list(ctx, query);
    return users.map((user) => new UserResponseDto(user));
  }

  @Get(':id')
  async get(@CurrentActor() ctx: RequestContext, @Param('id', ParseUUIDPipe) id: string): Promise<UserResponseDto> {
    requireAuthority(ctx, 'users.read');
    return new UserResponseDto(await this.userService.get(ctx, id));
  }

  @Post()
  async create(@CurrentActor() ctx: RequestContext, @Body() body: CreateUserDto): Promise<UserResponseDto> {
    requireAuthority(ctx, 'users.create');
    // 创建时携带角色等同于一次角色分配
    if (body.roleIds?.length || body.roleCodes?.length) {
      requireAuthority(ctx, 'users.assign_roles');
    }
    return new UserResponseDto(await this.userService.create(ctx, body));
  }

  @Put(':id')
  async update(
    @CurrentActor() ctx: RequestContext,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() body: UpdateUserDto,
  ): Promise<UserResponseDto> {
    requireAuthority(ctx, 'users.update');
    return new UserResponseDto(await this.userService.update(ctx, id, body));
  }

  /**
   * 软删除：停用账号
   */
  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async deactivate(@CurrentActor() ctx: RequestContext, @Param('id', ParseUUIDPipe) id: string): Promise<void> {
    requireAuthority(ctx, 'users.delete');
    await this.userService.deactivate(ctx, id);
  }

  @Put(':id/roles')
  async updateRoles(
    @CurrentActor() ctx: RequestContext,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() body: UpdateUserRolesDto,
  ): Promise<UserResponseDto> {
    requireAuthority(ctx, 'users.assign_roles');
    return new UserResponseDto(await this.userService.updateRoles(ctx, id, body));
  }

  @Post(':id/status')
  @HttpCode(HttpStatus.OK)
  async updateStatus(
    @CurrentActor() ctx: RequestContext,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() body: UpdateUserStatusDto,
  ): Promise<UserResponseDto> {
    requireAuthority(ctx, 'users.status');
    return new UserResponseDto(await this.userService.updateStatus(ctx, id, body.status));
  }

  @Get(':id/permissions')
  async permissions(
    @CurrentActor() ctx: RequestContext,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<string[]> {
    requireAuthority(ctx, 'users.read');
    return this.userService.permissions(ctx, id);
  }
}
