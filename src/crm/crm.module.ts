import { Module } from '@nestjs/common';
import { jsonFileStoreProvider } from '../storage/storage.providers';
import { CLIENT_STORE } from '../storage/storage.tokens';
import { CrmController } from './crm.controller';
import { CrmService } from './crm.service';

@Module({
  controllers: [CrmController],
  providers: [jsonFileStoreProvider(CLIENT_STORE, 'clientsFile', 'clients'), CrmService],
  exports: [CrmService],
})
export class CrmModule {}
