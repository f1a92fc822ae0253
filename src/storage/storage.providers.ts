import { Provider } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { appConfig, StorageConfig } from '../config/app.config';
import { JsonFileStore } from './json-file.store';

/**
 * Binds a JSON file store to an injection token. The file path comes from
 * the `app.storage` config namespace.
 */
export function jsonFileStoreProvider(
  token: symbol,
  file: keyof StorageConfig,
  collection: string,
): Provider {
  return {
    provide: token,
    inject: [appConfig.KEY],
    useFactory: (config: ConfigType<typeof appConfig>) =>
      new JsonFileStore(config.storage[file], collection),
  };
}
