import { Module } from '@nestjs/common';
import { CatalogController, CatalogManagementController } from './catalog.controller';
import { CatalogService } from './catalog.service';

@Module({
  controllers: [CatalogController, CatalogManagementController],
  providers: [CatalogService],
  exports: [CatalogService],
})
export class CatalogModule {}
