import { Body, Controller, Delete, Get, Param, ParseUUIDPipe, Patch, Post, Query, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { CurrentUser } from '../common/decorators/current-user.decorator';
import { Roles } from '../common/decorators/roles.decorator';
import { PaginationDto } from '../common/dto/pagination.dto';
import { JwtAuthGuard } from '../common/guards/jwt-auth.guard';
import { RolesGuard } from '../common/guards/roles.guard';
import { CurrentUserPayload } from '../common/types/current-user.type';
import { CreateOrderDto, OrderLineDto, ShopOrdersQueryDto, UpdateOrderStatusDto } from './dto/order.dto';
import { OrdersService } from './orders.service';

@ApiTags('Orders')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard)
@Controller({ path: 'orders', version: ['1'] })
export class OrdersController {
  constructor(private readonly orders: OrdersService) {}

  @Get()
  listMine(@CurrentUser() user: CurrentUserPayload, @Query() query: PaginationDto) {
    return this.orders.listMine(user.userId, query);
  }

  @Post()
  create(@CurrentUser() user: CurrentUserPayload, @Body() dto: CreateOrderDto) {
    return this.orders.create(user.userId, dto);
  }

  @Get(':id')
  detail(@CurrentUser() user: CurrentUserPayload, @Param('id', ParseUUIDPipe) id: string) {
    return this.orders.getDetail(user.userId, id);
  }

  @Patch(':id/status')
  updateStatus(
    @CurrentUser() user: CurrentUserPayload,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateOrderStatusDto,
  ) {
    return this.orders.updateStatus(user.userId, id, dto);
  }

  @Post(':id/items')
  addItem(
    @CurrentUser() user: CurrentUserPayload,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: OrderLineDto,
  ) {
    return this.orders.addItem(user.userId, id, dto);
  }

  @Delete(':id/items/:itemId')
  removeItem(
    @CurrentUser() user: CurrentUserPayload,
    @Param('id', ParseUUIDPipe) id: string,
    @Param('itemId', ParseUUIDPipe) itemId: string,
  ) {
    return this.orders.removeItem(user.userId, id, itemId);
  }

  @Delete(':id')
  @UseGuards(RolesGuard)
  @Roles('admin')
  remove(@CurrentUser() user: CurrentUserPayload, @Param('id', ParseUUIDPipe) id: string) {
    return this.orders.deleteOrder(user.userId, id);
  }
}

@ApiTags('Orders')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard, RolesGuard)
@Roles('shop_owner', 'staff', 'admin')
@Controller({ path: 'shops/:shopId/orders', version: ['1'] })
export class ShopOrdersController {
  constructor(private readonly orders: OrdersService) {}

  @Get()
  list(
    @CurrentUser() user: CurrentUserPayload,
    @Param('shopId', ParseUUIDPipe) shopId: string,
    @Query() query: ShopOrdersQueryDto,
  ) {
    return this.orders.listForShop(user.userId, shopId, query);
  }
}
