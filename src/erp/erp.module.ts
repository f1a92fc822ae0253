import { Module } from '@nestjs/common';
import { jsonFileStoreProvider } from '../storage/storage.providers';
import { ORDER_STORE } from '../storage/storage.tokens';
import { ErpController } from './erp.controller';
import { ErpService } from './erp.service';

@Module({
  controllers: [ErpController],
  providers: [jsonFileStoreProvider(ORDER_STORE, 'ordersFile', 'orders'), ErpService],
  exports: [ErpService],
})
export class ErpModule {}
