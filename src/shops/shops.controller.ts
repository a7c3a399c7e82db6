import { Body, Controller, Delete, Get, Param, ParseUUIDPipe, Patch, Post, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { CurrentUser } from '../common/decorators/current-user.decorator';
import { Roles } from '../common/decorators/roles.decorator';
import { JwtAuthGuard } from '../common/guards/jwt-auth.guard';
import { RolesGuard } from '../common/guards/roles.guard';
import { CurrentUserPayload } from '../common/types/current-user.type';
import { AddStaffDto, CreateShopDto, UpdateShopDto, UpdateStaffDto } from './dto/shop.dto';
import { ShopsService } from './shops.service';

@ApiTags('Shops')
@Controller({ path: 'shops', version: ['1'] })
export class PublicShopsController {
  constructor(private readonly shops: ShopsService) {}

  @Get()
  list() {
    return this.shops.listActive();
  }

  @Get(':shopId')
  get(@Param('shopId', ParseUUIDPipe) shopId: string) {
    return this.shops.getPublic(shopId);
  }
}

@ApiTags('Shops')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard, RolesGuard)
@Controller({ path: 'me/shop', version: ['1'] })
export class MyShopController {
  constructor(private readonly shops: ShopsService) {}

  @Get()
  @Roles('shop_owner', 'staff')
  get(@CurrentUser() user: CurrentUserPayload) {
    return this.shops.getMine(user.userId);
  }

  @Get('dashboard')
  @Roles('shop_owner', 'staff')
  dashboard(@CurrentUser() user: CurrentUserPayload) {
    return this.shops.getDashboard(user.userId);
  }

  @Post()
  @Roles('shop_owner')
  create(@CurrentUser() user: CurrentUserPayload, @Body() dto: CreateShopDto) {
    return this.shops.create(user.userId, dto);
  }
}

@ApiTags('Shops')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard, RolesGuard)
@Roles('shop_owner', 'admin')
@Controller({ path: 'shops/:shopId', version: ['1'] })
export class ShopManagementController {
  constructor(private readonly shops: ShopsService) {}

  @Patch()
  update(
    @CurrentUser() user: CurrentUserPayload,
    @Param('shopId', ParseUUIDPipe) shopId: string,
    @Body() dto: UpdateShopDto,
  ) {
    return this.shops.update(user.userId, shopId, dto);
  }

  @Get('staff')
  listStaff(@CurrentUser() user: CurrentUserPayload, @Param('shopId', ParseUUIDPipe) shopId: string) {
    return this.shops.listStaff(user.userId, shopId);
  }

  @Post('staff')
  addStaff(
    @CurrentUser() user: CurrentUserPayload,
    @Param('shopId', ParseUUIDPipe) shopId: string,
    @Body() dto: AddStaffDto,
  ) {
    return this.shops.addStaff(user.userId, shopId, dto);
  }

  @Patch('staff/:staffId')
  updateStaff(
    @CurrentUser() user: CurrentUserPayload,
    @Param('shopId', ParseUUIDPipe) shopId: string,
    @Param('staffId', ParseUUIDPipe) staffId: string,
    @Body() dto: UpdateStaffDto,
  ) {
    return this.shops.updateStaff(user.userId, shopId, staffId, dto);
  }

  @Delete('staff/:staffId')
  deactivateStaff(
    @CurrentUser() user: CurrentUserPayload,
    @Param('shopId', ParseUUIDPipe) shopId: string,
    @Param('staffId', ParseUUIDPipe) staffId: string,
  ) {
    return this.shops.deactivateStaff(user.userId, shopId, staffId);
  }
}
