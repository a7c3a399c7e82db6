import { Module } from '@nestjs/common';
import { MyShopController, PublicShopsController, ShopManagementController } from './shops.controller';
import { ShopsService } from './shops.service';

@Module({
  controllers: [MyShopController, PublicShopsController, ShopManagementController],
  providers: [ShopsService],
  exports: [ShopsService],
})
export class ShopsModule {}
