import { Module } from '@nestjs/common';
import { DatabaseModule } from '../database/index.js';
import { PostgresVectorIndex } from './postgres-vector-index.js';
import { VECTOR_INDEX } from './vector-index.types.js';

@Module({
  imports: [DatabaseModule],
  providers: [
    PostgresVectorIndex,
    {
      provide: VECTOR_INDEX,
      useExisting: PostgresVectorIndex,
    },
  ],
  exports: [VECTOR_INDEX],
})
export class VectorIndexModule {}
