import { Body, Controller, Get, Param, ParseUUIDPipe, Post, Query, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { CurrentUser } from '../common/decorators/current-user.decorator';
import { Roles } from '../common/decorators/roles.decorator';
import { JwtAuthGuard } from '../common/guards/jwt-auth.guard';
import { RolesGuard } from '../common/guards/roles.guard';
import { CurrentUserPayload } from '../common/types/current-user.type';
import {
  AdjustLoyaltyPointsDto,
  LoyaltyHistoryQueryDto,
  LoyaltyTransactionsQueryDto,
  RedeemPointsDto,
} from './dto/loyalty.dto';
import { LoyaltyService } from './loyalty.service';

@ApiTags('Loyalty')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard)
@Controller({ path: 'me/loyalty', version: ['1'] })
export class UserLoyaltyController {
  constructor(private readonly loyalty: LoyaltyService) {}

  @Get()
  summary(@CurrentUser() user: CurrentUserPayload, @Query() query: LoyaltyHistoryQueryDto) {
    return this.loyalty.getSummary(user.userId, user.userId, { historyLimit: query.limit });
  }

  @Get('transactions')
  transactions(@CurrentUser() user: CurrentUserPayload, @Query() query: LoyaltyTransactionsQueryDto) {
    return this.loyalty.listTransactions(user.userId, user.userId, query);
  }

  @Post('redeem')
  redeem(@CurrentUser() user: CurrentUserPayload, @Body() dto: RedeemPointsDto) {
    return this.loyalty.redeem(user.userId, user.userId, dto);
  }
}

@ApiTags('Loyalty')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard, RolesGuard)
@Roles('staff', 'shop_owner', 'admin')
@Controller({ path: 'customers/:customerId/loyalty', version: ['1'] })
export class CustomerLoyaltyController {
  constructor(private readonly loyalty: LoyaltyService) {}

  @Get()
  summary(
    @CurrentUser() user: CurrentUserPayload,
    @Param('customerId', ParseUUIDPipe) customerId: string,
    @Query() query: LoyaltyHistoryQueryDto,
  ) {
    return this.loyalty.getSummary(user.userId, customerId, { historyLimit: query.limit });
  }

  @Get('transactions')
  transactions(
    @CurrentUser() user: CurrentUserPayload,
    @Param('customerId', ParseUUIDPipe) customerId: string,
    @Query() query: LoyaltyTransactionsQueryDto,
  ) {
    return this.loyalty.listTransactions(user.userId, customerId, query);
  }

  @Post('redeem')
  redeem(
    @CurrentUser() user: CurrentUserPayload,
    @Param('customerId', ParseUUIDPipe) customerId: string,
    @Body() dto: RedeemPointsDto,
  ) {
    return this.loyalty.redeem(user.userId, customerId, dto);
  }

  @Post('adjust')
  @Roles('admin')
  adjust(
    @CurrentUser() user: CurrentUserPayload,
    @Param('customerId', ParseUUIDPipe) customerId: string,
    @Body() dto: AdjustLoyaltyPointsDto,
  ) {
    return this.loyalty.adjust(user.userId, customerId, dto);
  }
}
