import { Controller, Get, UseGuards } from '@nestjs/common';
import { AdminSecretGuard } from '../../core/guards/admin-secret.guard';
import { KofiMapper } from '../../domain/donations/mappers/kofi-mapper';
import {
  KofiTransactionPayload,
  KofiUserView,
} from '../../domain/donations/models/kofi-payload.model';
import { AdminService } from './admin.service';

@Controller('admin')
@UseGuards(AdminSecretGuard)
export class AdminController {
  constructor(private readonly adminService: AdminService) {}

  @Get('db/transactions')
  async listTransactions(): Promise<KofiTransactionPayload[]> {
    return KofiMapper.toTransactionPayloads(
      await this.adminService.listTransactions(),
    );
  }

  @Get('db/users')
  async listUsers(): Promise<KofiUserView[]> {
    const users = await this.adminService.listUsers();
    return users.map((user) => KofiMapper.toUserView(user));
  }
}
