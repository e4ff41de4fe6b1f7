import {
  Body,
  Controller,
  Get,
  Header,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Query,
} from '@nestjs/common';
import { KofiMapper } from '../../../domain/donations/mappers/kofi-mapper';
import { KofiTransactionPayload } from '../../../domain/donations/models/kofi-payload.model';
import { AmountQueryDto } from '../dto/amount-query.dto';
import { KofiService } from '../services/kofi.service';

@Controller('kofi')
export class KofiController {
  constructor(private readonly kofiService: KofiService) {}

  /**
   * Ko-fi posts form-encoded bodies with the JSON payload in `data`
   */
  @Post('webhook')
  @HttpCode(HttpStatus.OK)
  async receiveWebhook(@Body('data') data?: string): Promise<void> {
    await this.kofiService.receiveWebhook(data);
  }

  @Get('transactions/:token')
  async findTransactions(
    @Param('token') token: string,
  ): Promise<KofiTransactionPayload[]> {
    return KofiMapper.toTransactionPayloads(
      await this.kofiService.findTransactions(token),
    );
  }

  @Get('transactions/:token/:messageId')
  async findTransaction(
    @Param('token') token: string,
    @Param('messageId') messageId: string,
  ): Promise<KofiTransactionPayload> {
    return KofiMapper.toTransactionPayload(
      await this.kofiService.findTransaction(token, messageId),
    );
  }

  // A bare number is sent as text by the platform, which is also valid JSON.
  @Get('amount/:method/:token')
  @Header('Content-Type', 'application/json')
  async computeAmount(
    @Param('method') method: string,
    @Param('token') token: string,
    @Query() query: AmountQueryDto,
  ): Promise<number> {
    return this.kofiService.computeAmount({
      method,
      verificationToken: token,
      since: query.since,
      currency: query.currency,
    });
  }
}
