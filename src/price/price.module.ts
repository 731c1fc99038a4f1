import { Module } from '@nestjs/common';
import { PriceOracleClient } from './price-oracle.client';

@Module({
  providers: [PriceOracleClient],
  exports: [PriceOracleClient],
})
export class PriceModule {}
