import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Patch,
  Post,
  Query,
} from '@nestjs/common';
import { CurrentActor } from '../auth/actor.guard';
import { Actor } from '../common/actor';
import { Page } from '../common/pagination';
import { CreateUserDto, ListUsersQueryDto, SetRoleDto, UpdateUserDto } from './dto/user.dto';
import { toUserView, UserView } from './user.view';
import { UsersService } from './users.service';

@Controller('users')
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  @Get()
  async list(
    @CurrentActor() actor: Actor,
    @Query() query: ListUsersQueryDto,
  ): Promise<Page<UserView>> {
    const page = await this.usersService.list(actor, query);
    return { ...page, results: page.results.map(toUserView) };
  }

  @Post()
  async create(
    @CurrentActor() actor: Actor,
    @Body() body: CreateUserDto,
  ): Promise<UserView> {
    return toUserView(await this.usersService.create(actor, body));
  }

  @Get('me')
  async me(@CurrentActor() actor: Actor): Promise<UserView> {
    return toUserView(await this.usersService.me(actor));
  }

  @Patch('me')
  async updateMe(
    @CurrentActor() actor: Actor,
    @Body() body: UpdateUserDto,
  ): Promise<UserView> {
    return toUserView(await this.usersService.updateMe(actor, body));
  }

  @Get(':username')
  async get(
    @CurrentActor() actor: Actor,
    @Param('username') username: string,
  ): Promise<UserView> {
    return toUserView(await this.usersService.get(actor, username));
  }

  @Patch(':username')
  async update(
    @CurrentActor() actor: Actor,
    @Param('username') username: string,
    @Body() body: UpdateUserDto,
  ): Promise<UserView> {
    return toUserView(await this.usersService.update(actor, username, body));
  }

  @Patch(':username/role')
  async setRole(
    @CurrentActor() actor: Actor,
    @Param('username') username: string,
    @Body() body: SetRoleDto,
  ): Promise<UserView> {
    return toUserView(await this.usersService.setRole(actor, username, body.role));
  }

  @Delete(':username')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(
    @CurrentActor() actor: Actor,
    @Param('username') username: string,
  ): Promise<void> {
    await this.usersService.remove(actor, username);
  }
}
