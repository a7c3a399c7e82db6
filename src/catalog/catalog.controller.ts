import { Body, Controller, Get, Param, ParseUUIDPipe, Patch, Post, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { CurrentUser } from '../common/decorators/current-user.decorator';
import { Roles } from '../common/decorators/roles.decorator';
import { JwtAuthGuard } from '../common/guards/jwt-auth.guard';
import { RolesGuard } from '../common/guards/roles.guard';
import { CurrentUserPayload } from '../common/types/current-user.type';
import { CatalogService } from './catalog.service';
import {
  CreateCatalogEntryDto,
  CreateServicePriceDto,
  UpdateCatalogEntryDto,
  UpdateServicePriceDto,
} from './dto/catalog.dto';

@ApiTags('Catalog')
@Controller({ path: 'shops/:shopId/catalog', version: ['1'] })
export class CatalogController {
  constructor(private readonly catalog: CatalogService) {}

  @Get()
  get(@Param('shopId', ParseUUIDPipe) shopId: string) {
    return this.catalog.getCatalog(shopId);
  }
}

@ApiTags('Catalog')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard, RolesGuard)
@Roles('shop_owner', 'admin')
@Controller({ path: 'shops/:shopId', version: ['1'] })
export class CatalogManagementController {
  constructor(private readonly catalog: CatalogService) {}

  @Post('services')
  createService(
    @CurrentUser() user: CurrentUserPayload,
    @Param('shopId', ParseUUIDPipe) shopId: string,
    @Body() dto: CreateCatalogEntryDto,
  ) {
    return this.catalog.createService(user.userId, shopId, dto);
  }

  @Patch('services/:serviceId')
  updateService(
    @CurrentUser() user: CurrentUserPayload,
    @Param('shopId', ParseUUIDPipe) shopId: string,
    @Param('serviceId', ParseUUIDPipe) serviceId: string,
    @Body() dto: UpdateCatalogEntryDto,
  ) {
    return this.catalog.updateService(user.userId, shopId, serviceId, dto);
  }

  @Post('items')
  createItem(
    @CurrentUser() user: CurrentUserPayload,
    @Param('shopId', ParseUUIDPipe) shopId: string,
    @Body() dto: CreateCatalogEntryDto,
  ) {
    return this.catalog.createItem(user.userId, shopId, dto);
  }

  @Patch('items/:itemId')
  updateItem(
    @CurrentUser() user: CurrentUserPayload,
    @Param('shopId', ParseUUIDPipe) shopId: string,
    @Param('itemId', ParseUUIDPipe) itemId: string,
    @Body() dto: UpdateCatalogEntryDto,
  ) {
    return this.catalog.updateItem(user.userId, shopId, itemId, dto);
  }

  @Post('prices')
  createPrice(
    @CurrentUser() user: CurrentUserPayload,
    @Param('shopId', ParseUUIDPipe) shopId: string,
    @Body() dto: CreateServicePriceDto,
  ) {
    return this.catalog.createPrice(user.userId, shopId, dto);
  }

  @Patch('prices/:priceId')
  updatePrice(
    @CurrentUser() user: CurrentUserPayload,
    @Param('shopId', ParseUUIDPipe) shopId: string,
    @Param('priceId', ParseUUIDPipe) priceId: string,
    @Body() dto: UpdateServicePriceDto,
  ) {
    return this.catalog.updatePrice(user.userId, shopId, priceId, dto);
  }
}
