import { Module } from '@nestjs/common';
import { CustomerInsightsService } from './customer-insights.service';
import { CustomersController, MyProfileController, ShopCustomersController } from './customers.controller';
import { CustomersService } from './customers.service';

@Module({
  controllers: [MyProfileController, CustomersController, ShopCustomersController],
  providers: [CustomersService, CustomerInsightsService],
  exports: [CustomersService],
})
export class CustomersModule {}
