import {
  Controller,
  Delete,
  Get,
  Param,
  Patch,
  Post,
  Query,
} from '@nestjs/common';
import { KofiMapper } from '../../../domain/donations/mappers/kofi-mapper';
import { KofiUserView } from '../../../domain/donations/models/kofi-payload.model';
import {
  CreateUserQueryDto,
  DeleteUserQueryDto,
  UpdateUserQueryDto,
} from '../dto/user-query.dto';
import { UsersService } from '../services/users.service';

@Controller('user')
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  @Post(':token')
  async create(
    @Param('token') token: string,
    @Query() query: CreateUserQueryDto,
  ): Promise<KofiUserView> {
    const user = await this.usersService.create(
      token,
      query.data_retention_days,
    );
    return KofiMapper.toUserView(user);
  }

  @Get(':token')
  async findOne(@Param('token') token: string): Promise<KofiUserView> {
    return KofiMapper.toUserView(await this.usersService.getOrFail(token));
  }

  @Patch(':token')
  async update(
    @Param('token') token: string,
    @Query() query: UpdateUserQueryDto,
  ): Promise<KofiUserView> {
    const user = await this.usersService.update(token, {
      dataRetentionDays: query.days,
      latestRequestAt: query.latest_request_at,
      preferredCurrency: query.currency,
    });
    return KofiMapper.toUserView(user);
  }

  @Delete(':token')
  async remove(
    @Param('token') token: string,
    @Query() query: DeleteUserQueryDto,
  ): Promise<{ message: string }> {
    await this.usersService.remove(
      token,
      (query.include_transactions ?? query.inculde_transactions) !== 'false',
    );
    return { message: 'User deleted successfully' };
  }
}
