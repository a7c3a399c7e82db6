import { Body, Controller, Get, Param, ParseUUIDPipe, Patch, Post, Query, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { CurrentUser } from '../common/decorators/current-user.decorator';
import { Roles } from '../common/decorators/roles.decorator';
import { JwtAuthGuard } from '../common/guards/jwt-auth.guard';
import { RolesGuard } from '../common/guards/roles.guard';
import { CurrentUserPayload } from '../common/types/current-user.type';
import { CustomerInsightsService } from './customer-insights.service';
import { CustomersService } from './customers.service';
import {
  CustomerLookupQueryDto,
  RegisterWalkInCustomerDto,
  ShopCustomersQueryDto,
  UpdateCustomerProfileDto,
} from './dto/customer.dto';

@ApiTags('Customers')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard, RolesGuard)
@Roles('customer')
@Controller({ path: 'me/profile', version: ['1'] })
export class MyProfileController {
  constructor(private readonly customers: CustomersService) {}

  @Get()
  get(@CurrentUser() user: CurrentUserPayload) {
    return this.customers.getProfile(user.userId, user.userId);
  }

  @Patch()
  update(@CurrentUser() user: CurrentUserPayload, @Body() dto: UpdateCustomerProfileDto) {
    return this.customers.updateProfile(user.userId, dto);
  }
}

@ApiTags('Customers')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard, RolesGuard)
@Roles('staff', 'shop_owner', 'admin')
@Controller({ path: 'customers', version: ['1'] })
export class CustomersController {
  constructor(private readonly customers: CustomersService) {}

  @Post()
  registerWalkIn(@CurrentUser() user: CurrentUserPayload, @Body() dto: RegisterWalkInCustomerDto) {
    return this.customers.registerWalkIn(user.userId, dto);
  }

  @Get('lookup')
  lookup(@CurrentUser() user: CurrentUserPayload, @Query() query: CustomerLookupQueryDto) {
    return this.customers.lookupByPhone(user.userId, query.phone);
  }

  @Get(':customerId')
  get(@CurrentUser() user: CurrentUserPayload, @Param('customerId', ParseUUIDPipe) customerId: string) {
    return this.customers.getProfile(user.userId, customerId);
  }
}

@ApiTags('Customers')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard, RolesGuard)
@Roles('shop_owner', 'admin')
@Controller({ path: 'shops/:shopId/customers', version: ['1'] })
export class ShopCustomersController {
  constructor(private readonly insights: CustomerInsightsService) {}

  @Get()
  list(
    @CurrentUser() user: CurrentUserPayload,
    @Param('shopId', ParseUUIDPipe) shopId: string,
    @Query() query: ShopCustomersQueryDto,
  ) {
    return this.insights.list(user.userId, shopId, query);
  }

  @Get('stats')
  stats(@CurrentUser() user: CurrentUserPayload, @Param('shopId', ParseUUIDPipe) shopId: string) {
    return this.insights.stats(user.userId, shopId);
  }

  @Get(':customerId/analytics')
  analytics(
    @CurrentUser() user: CurrentUserPayload,
    @Param('shopId', ParseUUIDPipe) shopId: string,
    @Param('customerId', ParseUUIDPipe) customerId: string,
  ) {
    return this.insights.analytics(user.userId, shopId, customerId);
  }
}
