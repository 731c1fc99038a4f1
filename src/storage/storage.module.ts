import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Env } from '../config/env.validation';
import {
  BALANCE_RECORD_STORE,
  BalanceRecordStore,
} from './interfaces/balance-record-store.interface';
import { CsvFileBalanceRecordStore } from './csv-file.store';
import { InMemoryBalanceRecordStore } from './in-memory.store';

/**
 * StorageModule
 *
 * Binds BALANCE_RECORD_STORE to the implementation selected by
 * BALANCE_STORE ('file' by default).
 */
@Module({
  providers: [
    {
      provide: BALANCE_RECORD_STORE,
      inject: [ConfigService],
      useFactory: (
        configService: ConfigService<Env, true>,
      ): BalanceRecordStore => {
        const kind = configService.get('BALANCE_STORE', { infer: true });
        if (kind === 'memory') {
          new Logger(StorageModule.name).warn(
            'Using in-memory balance store, records are lost on restart',
          );
          return new InMemoryBalanceRecordStore();
        }
        return new CsvFileBalanceRecordStore(
          configService.get('BALANCE_DATA_DIR', { infer: true }),
        );
      },
    },
  ],
  exports: [BALANCE_RECORD_STORE],
})
export class StorageModule {}
